import { injectable, inject } from 'inversify';
import * as fs from 'fs';
import * as path from 'path';
import { FilesystemError, describeError, isErrnoException } from './errors';
import type { ILogger } from './logger';
import { typePrefix } from './mapper';
import { TYPES } from './tokens';
import type { ExporterConfig, Ticket } from './types';

export interface ITicketWriter {
  prepareOutputDir(outputDir: string, options: { clean: boolean }): Promise<void>;
  directoryFor(ticket: Ticket, parentDir: string): string;
  writeTicket(ticket: Ticket, directory: string): Promise<string[]>;
}

export interface RenderOptions {
  includeComments: boolean;
}

const MAX_TITLE_LENGTH = 50;
const METADATA_FILE = 'metadata.json';

// Disk-level conditions that will fail every remaining ticket too
const FATAL_CODES = new Set(['ENOSPC', 'EROFS', 'EDQUOT']);

/**
 * Replaces characters that are invalid in file names on common platforms,
 * then strips leading/trailing dots and spaces.
 */
export function sanitizeFileName(name: string): string {
  return name
    .replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_')
    .replace(/^[. ]+|[. ]+$/g, '');
}

export function ticketDirectoryName(ticket: Pick<Ticket, 'key' | 'level' | 'title'>): string {
  // Count code points so a surrogate pair is never split
  const title = Array.from(ticket.title).slice(0, MAX_TITLE_LENGTH).join('');
  return sanitizeFileName(`${typePrefix(ticket.level)}-${ticket.key}-${title.trim()}`);
}

export function ticketFileName(ticket: Pick<Ticket, 'key'>): string {
  return `${sanitizeFileName(ticket.key)}.md`;
}

export function renderTicketMarkdown(ticket: Ticket, options: RenderOptions): string {
  const lines: string[] = [
    `# ${ticket.key}: ${ticket.title}`,
    '',
    '## Metadata',
    '',
    `- Type: ${ticket.type}`,
    `- Status: ${ticket.status}`,
    `- Reporter: ${ticket.reporter ?? 'Unknown'}`,
    `- Assignee: ${ticket.assignee ?? 'Unassigned'}`,
    `- Updated: ${ticket.updated ?? 'Unknown'}`,
    `- URL: ${ticket.url}`,
  ];

  if (ticket.parent) {
    const parentTitle = ticket.parent.title ? ` - ${ticket.parent.title}` : '';
    lines.push(`- Parent: [${ticket.parent.key}](${ticket.parent.url})${parentTitle}`);
  }

  lines.push('', '## Description', '', ticket.description ?? '_No description provided_');

  if (options.includeComments && ticket.comments.length > 0) {
    lines.push('', '## Comments');
    for (const comment of ticket.comments) {
      lines.push('', `### ${comment.author} - ${comment.updated ?? 'Unknown'}`, '', comment.body);
    }
  }

  return lines.join('\n') + '\n';
}

export function renderTicketMetadata(ticket: Ticket): string {
  const metadata = {
    key: ticket.key,
    id: ticket.id,
    url: ticket.url,
    type: ticket.type,
    level: ticket.level,
    status: ticket.status,
    summary: ticket.title,
    reporter: ticket.reporter,
    assignee: ticket.assignee,
    updated: ticket.updated,
    ...(ticket.parent ? { parent: { key: ticket.parent.key, type: ticket.parent.type } } : {}),
  };
  return JSON.stringify(metadata, null, 2) + '\n';
}

@injectable()
export class TicketWriter implements ITicketWriter {
  constructor(
    @inject(TYPES.Config) private config: ExporterConfig,
    @inject(TYPES.ILogger) private logger: ILogger
  ) {}

  async prepareOutputDir(outputDir: string, options: { clean: boolean }): Promise<void> {
    const resolved = path.resolve(outputDir);

    try {
      const stats = await fs.promises.stat(resolved);
      if (!stats.isDirectory()) {
        throw new FilesystemError(`Output path ${resolved} is not a directory`, { path: resolved, fatal: true });
      }
    } catch (error) {
      if (error instanceof FilesystemError) throw error;
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw this.fatal(`Cannot inspect output directory ${resolved}`, resolved, error);
      }
    }

    if (options.clean) {
      await this.cleanDirectory(resolved);
    }

    try {
      await fs.promises.mkdir(resolved, { recursive: true });
      await fs.promises.access(resolved, fs.constants.W_OK);
    } catch (error) {
      throw this.fatal(`Output directory ${resolved} is not writable`, resolved, error);
    }
  }

  directoryFor(ticket: Ticket, parentDir: string): string {
    return path.join(parentDir, ticketDirectoryName(ticket));
  }

  async writeTicket(ticket: Ticket, directory: string): Promise<string[]> {
    const files: string[] = [];
    let target = directory;
    try {
      await fs.promises.mkdir(directory, { recursive: true });

      target = path.join(directory, ticketFileName(ticket));
      await fs.promises.writeFile(target, renderTicketMarkdown(ticket, { includeComments: this.config.includeComments }), 'utf-8');
      files.push(target);

      if (this.config.writeMetadata) {
        target = path.join(directory, METADATA_FILE);
        await fs.promises.writeFile(target, renderTicketMetadata(ticket), 'utf-8');
        files.push(target);
      }
    } catch (error) {
      const code = isErrnoException(error) ? error.code : undefined;
      throw new FilesystemError(`Failed to write ${ticket.key} to ${target}: ${describeError(error)}`, {
        path: target,
        ticketKey: ticket.key,
        fatal: code !== undefined && FATAL_CODES.has(code),
        cause: error,
      });
    }

    this.logger.debug(`Wrote ${ticket.key} to ${directory}`);
    return files;
  }

  private async cleanDirectory(directory: string): Promise<void> {
    const cwd = process.cwd();
    const relativeToCwd = path.relative(directory, cwd);
    const containsCwd = relativeToCwd === '' || (!relativeToCwd.startsWith('..') && !path.isAbsolute(relativeToCwd));
    if (directory === path.parse(directory).root || containsCwd) {
      throw new FilesystemError(`Refusing to clean ${directory}: it contains the working directory`, { path: directory, fatal: true });
    }

    let entries: string[];
    try {
      entries = await fs.promises.readdir(directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return;
      throw this.fatal(`Cannot read output directory ${directory}`, directory, error);
    }

    for (const entry of entries) {
      const entryPath = path.join(directory, entry);
      try {
        await fs.promises.rm(entryPath, { recursive: true, force: true });
      } catch (error) {
        throw this.fatal(`Failed to remove ${entryPath}`, entryPath, error);
      }
    }
    this.logger.info(`Cleaned ${entries.length} entries from ${directory}`);
  }

  private fatal(message: string, target: string, cause: unknown): FilesystemError {
    return new FilesystemError(`${message}: ${describeError(cause)}`, { path: target, fatal: true, cause });
  }
}
