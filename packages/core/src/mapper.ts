import { TransportError } from './errors';
import type { ParentRef, Ticket, TicketComment, TicketLevel } from './types';

export interface MapperOptions {
  baseUrl: string;
  epicLinkField: string | null;
}

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: unknown, key: string): string | null {
  if (!isRecord(source)) return null;
  const value = source[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function readRecord(source: unknown, key: string): JsonRecord | null {
  if (!isRecord(source)) return null;
  const value = source[key];
  return isRecord(value) ? value : null;
}

const BLOCK_NODES = new Set(['paragraph', 'heading', 'bulletList', 'orderedList', 'listItem', 'blockquote', 'codeBlock', 'rule']);

/**
 * Flattens an Atlassian Document Format node into plain text.
 * Plain strings (REST v2 bodies) pass through unchanged.
 */
export function extractAdfText(node: unknown): string {
  if (node === null || node === undefined) return '';
  if (typeof node === 'string') return node;
  if (!isRecord(node)) return '';

  if (node.type === 'text') return typeof node.text === 'string' ? node.text : '';
  if (node.type === 'hardBreak') return '\n';
  if (node.type === 'mention' || node.type === 'emoji') {
    const attrs = readRecord(node, 'attrs');
    return readString(attrs, 'text') ?? '';
  }

  let text = '';
  if (Array.isArray(node.content)) {
    for (const child of node.content) {
      text += extractAdfText(child);
    }
  }
  if (typeof node.type === 'string' && BLOCK_NODES.has(node.type) && !text.endsWith('\n')) {
    text += '\n';
  }
  return text;
}

export function ticketLevel(typeName: string): TicketLevel {
  const lower = typeName.toLowerCase();
  if (lower.includes('initiative')) return 'initiative';
  if (lower.includes('epic')) return 'epic';
  if (lower.includes('story')) return 'story';
  return 'task';
}

const LEVEL_PREFIXES: Record<TicketLevel, string> = {
  initiative: 'INI',
  epic: 'EPIC',
  story: 'STORY',
  task: 'TASK',
};

export function typePrefix(level: TicketLevel): string {
  return LEVEL_PREFIXES[level];
}

export function browseUrl(baseUrl: string, key: string): string {
  return `${baseUrl}/browse/${key}`;
}

export interface CommentPage {
  comments: TicketComment[];
  startAt: number;
  // Number of comments on the issue, which can exceed the page
  total: number;
}

function readNumber(source: JsonRecord, key: string): number | null {
  const value = source[key];
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
}

/**
 * Maps a page of comments, either embedded in `fields.comment` or returned by
 * `/issue/<key>/comment`. Entries that are not objects are skipped.
 */
export function parseCommentPage(raw: unknown): CommentPage {
  const entries = isRecord(raw) && Array.isArray(raw.comments) ? raw.comments : [];
  const comments: TicketComment[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    comments.push({
      author: readString(readRecord(entry, 'author'), 'displayName') ?? 'Unknown',
      created: readString(entry, 'created'),
      updated: readString(entry, 'updated') ?? readString(entry, 'created'),
      body: extractAdfText(entry.body).trim(),
    });
  }
  const startAt = (isRecord(raw) && readNumber(raw, 'startAt')) || 0;
  const total = isRecord(raw) ? readNumber(raw, 'total') : null;
  return { comments, startAt, total: Math.max(total ?? 0, startAt + entries.length) };
}

/** The comment page embedded in a raw issue payload */
export function embeddedCommentPage(raw: unknown): CommentPage {
  return parseCommentPage(readRecord(readRecord(raw, 'fields'), 'comment'));
}

function parseParent(fields: JsonRecord, options: MapperOptions): ParentRef | null {
  const parent = readRecord(fields, 'parent');
  const parentKey = readString(parent, 'key');
  if (parent && parentKey) {
    const parentFields = readRecord(parent, 'fields');
    return {
      key: parentKey,
      type: readString(readRecord(parentFields, 'issuetype'), 'name'),
      title: readString(parentFields, 'summary'),
      url: browseUrl(options.baseUrl, parentKey),
    };
  }

  // Company-managed projects may still link stories to epics through the legacy field
  if (options.epicLinkField) {
    const epicKey = readString(fields, options.epicLinkField);
    if (epicKey) {
      return { key: epicKey, type: 'Epic', title: null, url: browseUrl(options.baseUrl, epicKey) };
    }
  }

  return null;
}

/**
 * Validates a raw issue payload and maps it to a Ticket.
 * Every missing required field is reported in a single TransportError.
 */
export function parseIssue(raw: unknown, options: MapperOptions): Ticket {
  const errors: string[] = [];

  if (!isRecord(raw)) {
    throw new TransportError('Malformed issue in Jira response: expected an object');
  }

  const key = readString(raw, 'key');
  const id = readString(raw, 'id');
  const fields = readRecord(raw, 'fields');

  if (!key) errors.push('key is missing');
  if (!id) errors.push('id is missing');
  if (!fields) errors.push('fields is missing');

  const title = readString(fields, 'summary');
  const type = readString(readRecord(fields, 'issuetype'), 'name');
  const status = readString(readRecord(fields, 'status'), 'name');

  if (fields) {
    if (title === null) errors.push('fields.summary is missing');
    if (type === null) errors.push('fields.issuetype.name is missing');
    if (status === null) errors.push('fields.status.name is missing');
  }

  if (errors.length > 0 || !key || !id || !fields || title === null || type === null || status === null) {
    throw new TransportError(`Malformed issue ${key ?? '<unknown>'} in Jira response: ${errors.join(', ')}`);
  }

  const description = extractAdfText(fields.description).trim();

  return {
    key,
    id,
    type,
    level: ticketLevel(type),
    title,
    description: description || null,
    status,
    parent: parseParent(fields, options),
    assignee: readString(readRecord(fields, 'assignee'), 'displayName'),
    reporter: readString(readRecord(fields, 'reporter'), 'displayName'),
    updated: readString(fields, 'updated'),
    comments: parseCommentPage(fields.comment).comments,
    url: browseUrl(options.baseUrl, key),
  };
}
