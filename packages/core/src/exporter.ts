import { injectable, inject } from 'inversify';
import * as path from 'path';
import type { ITicketClient } from './client';
import { FilesystemError } from './errors';
import type { ILogger } from './logger';
import type { IHierarchyResolver } from './resolver';
import { TYPES } from './tokens';
import type { ExportFailure, ExportReport, ExportScope, ExporterConfig, TicketLevel, WrittenTicket } from './types';
import type { ITicketWriter } from './writer';

export interface IExportService {
  run(scope: ExportScope): Promise<ExportReport>;
}

@injectable()
export class ExportService implements IExportService {
  constructor(
    @inject(TYPES.Config) private config: ExporterConfig,
    @inject(TYPES.ITicketClient) private client: ITicketClient,
    @inject(TYPES.IHierarchyResolver) private resolver: IHierarchyResolver,
    @inject(TYPES.ITicketWriter) private writer: ITicketWriter,
    @inject(TYPES.ILogger) private logger: ILogger
  ) {}

  async run(scope: ExportScope): Promise<ExportReport> {
    const user = await this.client.verifyCredentials();
    this.logger.debug(`Authenticated as ${user}`);

    // Resolve everything before touching the disk so a bad key writes nothing
    const nodes = await this.resolver.resolve(scope);
    this.logger.debug(`Resolved ${nodes.length} tickets for export`);

    const outputDir = path.resolve(this.config.outputDir);
    await this.writer.prepareOutputDir(outputDir, { clean: this.config.clean });

    const directories = new Map<string, string>();
    const written: WrittenTicket[] = [];
    const failures: ExportFailure[] = [];
    const failed = new Set<string>();

    for (const node of nodes) {
      const { ticket } = node;
      const parentDir = (node.parentKey && directories.get(node.parentKey)) || outputDir;
      const directory = this.writer.directoryFor(ticket, parentDir);
      directories.set(ticket.key, directory);

      if (node.parentKey && failed.has(node.parentKey)) {
        const error = new FilesystemError(`Skipped ${ticket.key}: parent ${node.parentKey} was not written`, {
          path: directory,
          ticketKey: ticket.key,
        });
        this.logger.error(error.message);
        failures.push({ key: ticket.key, error });
        failed.add(ticket.key);
        continue;
      }

      try {
        const files = await this.writer.writeTicket(ticket, directory);
        written.push({ key: ticket.key, level: ticket.level, directory, files });
      } catch (error) {
        if (error instanceof FilesystemError && !error.fatal) {
          this.logger.error(error.message);
          failures.push({ key: ticket.key, error });
          failed.add(ticket.key);
          continue;
        }
        throw error;
      }
    }

    return { scope, outputDir, written, failures };
  }
}

const LEVEL_LABELS: [TicketLevel[], string][] = [
  [['initiative'], 'Initiatives'],
  [['epic'], 'Epics'],
  [['story', 'task'], 'Stories/Tasks'],
];

export function summarizeReport(report: ExportReport): string[] {
  const relativeDir = path.relative(process.cwd(), report.outputDir) || '.';
  const target = report.scope.kind === 'project' ? `project ${report.scope.projectKey}` : report.scope.key;
  const lines = [`Exported ${countOf(report.written.length, 'ticket')} from ${target} into '${relativeDir}${path.sep}'`];

  for (const [levels, label] of LEVEL_LABELS) {
    const count = report.written.filter(entry => levels.includes(entry.level)).length;
    lines.push(`- ${label}: ${count}`);
  }

  if (report.failures.length > 0) {
    lines.push(`${countOf(report.failures.length, 'ticket')} failed:`);
    for (const failure of report.failures) {
      lines.push(`- ${failure.key}: ${failure.error.message}`);
    }
  }

  return lines;
}

function countOf(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
