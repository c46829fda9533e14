import { injectable, inject } from 'inversify';
import { NotFoundError, TransportError } from './errors';
import type { JiraHttp } from './http';
import type { ILogger } from './logger';
import { embeddedCommentPage, parseCommentPage, parseIssue, type MapperOptions } from './mapper';
import { TYPES } from './tokens';
import type { ExporterConfig, Ticket, TicketComment } from './types';

export interface ITicketClient {
  verifyCredentials(): Promise<string>;
  fetchProject(projectKey: string): Promise<Ticket[]>;
  fetchTicket(key: string): Promise<Ticket>;
  fetchChildren(key: string): Promise<Ticket[]>;
}

const BASE_FIELDS = ['summary', 'status', 'issuetype', 'parent', 'description', 'assignee', 'reporter', 'updated', 'comment'];

interface SearchPage {
  issues: unknown[];
  nextPageToken: string | null;
  isLast: boolean;
}

/**
 * Jira Cloud REST v3 client. Searches go through the token-paginated
 * `/search/jql` endpoint and are exhausted before returning.
 */
@injectable()
export class JiraTicketClient implements ITicketClient {
  private readonly fields: string;
  private readonly mapperOptions: MapperOptions;

  constructor(
    @inject(TYPES.Config) private config: ExporterConfig,
    @inject(TYPES.JiraHttp) private http: JiraHttp,
    @inject(TYPES.ILogger) private logger: ILogger
  ) {
    this.fields = [...BASE_FIELDS, ...(config.epicLinkField ? [config.epicLinkField] : [])].join(',');
    this.mapperOptions = { baseUrl: config.baseUrl, epicLinkField: config.epicLinkField };
  }

  async verifyCredentials(): Promise<string> {
    const response = await this.http.get('/myself');
    const data: unknown = response.data;
    if (typeof data === 'object' && data !== null && 'displayName' in data && typeof data.displayName === 'string') {
      return data.displayName;
    }
    return this.config.username;
  }

  async fetchProject(projectKey: string): Promise<Ticket[]> {
    const clauses = [`project = ${quoteJql(projectKey)}`, 'issuetype not in subTaskIssueTypes()'];
    if (this.config.openOnly) clauses.push('statusCategory != Done');
    return this.search(`${clauses.join(' AND ')} ORDER BY key ASC`);
  }

  async fetchTicket(key: string): Promise<Ticket> {
    try {
      const response = await this.http.get(`/issue/${encodeURIComponent(key)}`, {
        params: { fields: this.fields },
      });
      return await this.completeComments(response.data, parseIssue(response.data, this.mapperOptions));
    } catch (error) {
      if (error instanceof NotFoundError) {
        throw new NotFoundError(`Ticket ${key} does not exist or is not visible to ${this.config.username}`, { key, cause: error });
      }
      throw error;
    }
  }

  async fetchChildren(key: string): Promise<Ticket[]> {
    let relation = `parent = ${quoteJql(key)}`;
    if (this.config.epicLinkField) {
      const fieldId = this.config.epicLinkField.replace('customfield_', '');
      relation = `(${relation} OR cf[${fieldId}] = ${quoteJql(key)})`;
    }
    const clauses = [relation];
    if (this.config.openOnly) clauses.push('statusCategory != Done');
    return this.search(`${clauses.join(' AND ')} ORDER BY key ASC`);
  }

  private async search(jql: string): Promise<Ticket[]> {
    this.logger.debug(`JQL: ${jql}`);
    const tickets: Ticket[] = [];
    const seenTokens = new Set<string>();
    let nextPageToken: string | null = null;

    while (true) {
      const params: Record<string, string | number> = {
        jql,
        fields: this.fields,
        maxResults: this.config.pageSize,
      };
      if (nextPageToken) params.nextPageToken = nextPageToken;

      const response = await this.http.get('/search/jql', { params });
      const page = parseSearchPage(response.data);
      for (const issue of page.issues) {
        tickets.push(await this.completeComments(issue, parseIssue(issue, this.mapperOptions)));
      }
      this.logger.debug(`Fetched ${page.issues.length} issues (${tickets.length} so far)`);

      if (page.isLast || !page.nextPageToken || page.issues.length === 0) break;
      if (seenTokens.has(page.nextPageToken)) {
        throw new TransportError(`Jira returned a repeated page token while searching: ${jql}`);
      }
      seenTokens.add(page.nextPageToken);
      nextPageToken = page.nextPageToken;
    }

    return tickets;
  }

  // Issue payloads embed only the first page of comments
  private async completeComments(raw: unknown, ticket: Ticket): Promise<Ticket> {
    if (!this.config.includeComments) return ticket;
    const { total } = embeddedCommentPage(raw);
    if (total <= ticket.comments.length) return ticket;

    this.logger.debug(`${ticket.key}: fetching all ${total} comments`);
    return { ...ticket, comments: await this.fetchComments(ticket.key) };
  }

  private async fetchComments(key: string): Promise<TicketComment[]> {
    const comments: TicketComment[] = [];
    while (true) {
      const response = await this.http.get(`/issue/${encodeURIComponent(key)}/comment`, {
        params: { startAt: comments.length, maxResults: this.config.pageSize },
      });
      const page = parseCommentPage(response.data);
      comments.push(...page.comments);
      if (page.comments.length === 0 || comments.length >= page.total) break;
    }
    return comments;
  }
}

function parseSearchPage(data: unknown): SearchPage {
  if (typeof data !== 'object' || data === null || !('issues' in data) || !Array.isArray(data.issues)) {
    throw new TransportError('Malformed Jira search response: issues array is missing');
  }
  const nextPageToken = 'nextPageToken' in data && typeof data.nextPageToken === 'string' ? data.nextPageToken : null;
  // Older deployments omit isLast; a missing token then marks the final page
  const isLast = 'isLast' in data && typeof data.isLast === 'boolean' ? data.isLast : nextPageToken === null;
  return { issues: data.issues, nextPageToken, isLast };
}

export function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
