export type TicketLevel = 'initiative' | 'epic' | 'story' | 'task';

export interface ParentRef {
  key: string;
  type: string | null;
  title: string | null;
  url: string;
}

export interface TicketComment {
  author: string;
  created: string | null;
  updated: string | null;
  body: string;
}

export interface Ticket {
  key: string;
  id: string;
  type: string; // raw issue type name as reported by Jira
  level: TicketLevel;
  title: string;
  description: string | null;
  status: string;
  parent: ParentRef | null;
  assignee: string | null;
  reporter: string | null;
  updated: string | null;
  comments: TicketComment[];
  url: string;
}

export type ExportScope =
  | { kind: 'project'; projectKey: string }
  | { kind: 'ticket'; key: string; recursive: boolean };

export interface ExportNode {
  ticket: Ticket;
  parentKey: string | null; // effective parent in the exported tree
  childKeys: string[];
  depth: number;
}

export interface WrittenTicket {
  key: string;
  level: TicketLevel;
  directory: string;
  files: string[];
}

export interface ExportFailure {
  key: string;
  error: Error;
}

export interface ExportReport {
  scope: ExportScope;
  outputDir: string;
  written: WrittenTicket[];
  failures: ExportFailure[];
}

export interface ExporterConfig {
  baseUrl: string;
  projectKey: string;
  username: string;
  apiToken: string;
  outputDir: string;
  pageSize: number;
  epicLinkField: string | null;
  includeComments: boolean;
  writeMetadata: boolean;
  openOnly: boolean;
  clean: boolean;
}
