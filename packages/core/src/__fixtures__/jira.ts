/**
 * Shared fixtures for Jira payloads, tickets and an in-memory ticket client.
 */
import type { ITicketClient } from '../client';
import { NotFoundError } from '../errors';
import type { ILogger } from '../logger';
import { ticketLevel } from '../mapper';
import type { ExporterConfig, Ticket } from '../types';

export const BASE_URL = 'https://jira.example.com';

export const testConfig: ExporterConfig = {
  baseUrl: BASE_URL,
  projectKey: 'DEMO',
  username: 'tester@example.com',
  apiToken: 'test-secret',
  outputDir: 'tickets',
  pageSize: 50,
  epicLinkField: null,
  includeComments: true,
  writeMetadata: false,
  openOnly: false,
  clean: false,
};

/** Raw issue as returned by /rest/api/3/issue and /rest/api/3/search/jql */
export function makeJiraIssue(
  key: string,
  options: { type?: string; summary?: string; status?: string; parentKey?: string; description?: unknown; comment?: unknown } = {}
): Record<string, unknown> {
  const fields: Record<string, unknown> = {
    summary: options.summary ?? `Summary of ${key}`,
    issuetype: { name: options.type ?? 'Story' },
    status: { name: options.status ?? 'To Do' },
    description: options.description ?? null,
    assignee: null,
    reporter: { displayName: 'Rita Reporter' },
    updated: '2024-03-01T10:00:00.000+0000',
    comment: options.comment ?? { comments: [] },
  };
  if (options.parentKey) {
    fields.parent = {
      key: options.parentKey,
      fields: { summary: `Summary of ${options.parentKey}`, issuetype: { name: 'Epic' } },
    };
  }
  return { id: String(10000 + Number(key.split('-')[1] ?? 0)), key, fields };
}

export function makeTicket(key: string, overrides: Partial<Ticket> & { parentKey?: string } = {}): Ticket {
  const { parentKey, ...rest } = overrides;
  const type = rest.type ?? 'Story';
  return {
    key,
    id: String(10000 + Number(key.split('-')[1] ?? 0)),
    type,
    level: ticketLevel(type),
    title: `Summary of ${key}`,
    description: null,
    status: 'To Do',
    parent: parentKey ? { key: parentKey, type: null, title: null, url: `${BASE_URL}/browse/${parentKey}` } : null,
    assignee: null,
    reporter: 'Rita Reporter',
    updated: '2024-03-01T10:00:00.000+0000',
    comments: [],
    url: `${BASE_URL}/browse/${key}`,
    ...rest,
  };
}

/** The DEMO hierarchy: initiative DEMO-1 > epic DEMO-2 > story DEMO-3 */
export function demoHierarchy(): Ticket[] {
  return [
    makeTicket('DEMO-1', { type: 'Initiative', title: 'Platform relaunch' }),
    makeTicket('DEMO-2', { type: 'Epic', title: 'Checkout', parentKey: 'DEMO-1' }),
    makeTicket('DEMO-3', { type: 'Story', title: 'Pay by card', parentKey: 'DEMO-2' }),
  ];
}

/**
 * In-memory ITicketClient. Children are derived from each ticket's parent
 * reference; `extraChildren` lets a test inject repeats or back-references.
 */
export class FakeTicketClient implements ITicketClient {
  readonly calls: string[] = [];
  private readonly extraChildren = new Map<string, Ticket[]>();

  constructor(private tickets: Ticket[], private projectResult: Ticket[] = tickets) {}

  addChildren(key: string, children: Ticket[]): void {
    this.extraChildren.set(key, [...(this.extraChildren.get(key) ?? []), ...children]);
  }

  async verifyCredentials(): Promise<string> {
    this.calls.push('verifyCredentials');
    return 'Test User';
  }

  async fetchProject(projectKey: string): Promise<Ticket[]> {
    this.calls.push(`fetchProject:${projectKey}`);
    return this.projectResult;
  }

  async fetchTicket(key: string): Promise<Ticket> {
    this.calls.push(`fetchTicket:${key}`);
    const ticket = this.tickets.find(t => t.key === key);
    if (!ticket) {
      throw new NotFoundError(`Ticket ${key} does not exist or is not visible to tester@example.com`, { key });
    }
    return ticket;
  }

  async fetchChildren(key: string): Promise<Ticket[]> {
    this.calls.push(`fetchChildren:${key}`);
    const direct = this.tickets.filter(t => t.parent?.key === key);
    return [...direct, ...(this.extraChildren.get(key) ?? [])];
  }
}

export class RecordingLogger implements ILogger {
  readonly messages: { level: string; message: string }[] = [];

  debug(message: string): void {
    this.messages.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.messages.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }

  at(level: string): string[] {
    return this.messages.filter(m => m.level === level).map(m => m.message);
  }
}
