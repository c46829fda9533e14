import { Command, InvalidArgumentError } from 'commander';
import type { Container } from 'inversify';
import {
  ConsoleLogger,
  ExitCode,
  ExportError,
  LogLevel,
  TYPES,
  createContainer,
  describeError,
  loadConfig,
  summarizeReport,
  type ExportScope,
  type ExporterConfig,
  type IExportService,
  type ILogger,
} from '@strata/core';

export interface ExportCommandOptions {
  recursive?: boolean;
  output?: string;
  clean?: boolean;
  metadata?: boolean;
  comments?: boolean;
  openOnly?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  logger: ConsoleLogger;
  createContainer: (config: ExporterConfig, logger: ILogger) => Container;
}

const TICKET_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_]*-\d+$/;

export function parseTicketKey(value: string): string {
  const key = value.trim();
  if (!TICKET_KEY_PATTERN.test(key)) {
    throw new InvalidArgumentError(`"${value}" is not a ticket key (expected something like DEMO-42).`);
  }
  return key.toUpperCase();
}

export function defaultDependencies(): CliDependencies {
  return {
    env: process.env,
    logger: new ConsoleLogger(LogLevel.INFO),
    createContainer: (config, logger) => createContainer(config, { logger }),
  };
}

/**
 * Runs one export and returns the process exit code.
 * Configuration is validated before the container exists, so a bad
 * environment never reaches the network.
 */
export async function runExport(ticket: string | undefined, options: ExportCommandOptions, deps: CliDependencies): Promise<number> {
  const { logger } = deps;
  if (options.verbose) logger.setLevel(LogLevel.DEBUG);
  else if (options.quiet) logger.setLevel(LogLevel.WARN);

  try {
    const config = loadConfig(deps.env, {
      outputDir: options.output,
      clean: options.clean,
      writeMetadata: options.metadata,
      includeComments: options.comments,
      openOnly: options.openOnly,
    });

    if (options.recursive && !ticket) {
      logger.warn('--recursive has no effect without a ticket; exporting the whole project');
    }

    const scope: ExportScope = ticket
      ? { kind: 'ticket', key: ticket, recursive: options.recursive ?? false }
      : { kind: 'project', projectKey: config.projectKey };

    const container = deps.createContainer(config, logger);
    const exporter = container.get<IExportService>(TYPES.IExportService);
    const report = await exporter.run(scope);

    for (const line of summarizeReport(report)) {
      logger.info(line);
    }
    return report.failures.length > 0 ? ExitCode.Failure : ExitCode.Success;
  } catch (error) {
    if (error instanceof ExportError) {
      logger.error(error.message);
      return error.exitCode;
    }
    logger.error(`Unexpected failure: ${describeError(error)}`);
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return ExitCode.Failure;
  }
}

export function buildProgram(deps: CliDependencies = defaultDependencies()): Command {
  const program = new Command();

  program
    .name('strata')
    .description('Export Jira initiatives, epics and stories into a local directory tree')
    .version('1.0.0')
    .argument('[ticket]', 'ticket key to export (defaults to the whole JIRA_PROJECT)', parseTicketKey)
    .option('-r, --recursive', 'also export every descendant of the given ticket')
    .option('-o, --output <dir>', 'output directory (default: $STRATA_OUTPUT_DIR or ./tickets)')
    .option('--clean', 'remove existing contents of the output directory first')
    .option('--metadata', 'write a metadata.json next to each ticket file')
    .option('--no-comments', 'leave comments out of the ticket files')
    .option('--open-only', 'skip tickets whose status category is Done')
    .option('-v, --verbose', 'print debug output')
    .option('-q, --quiet', 'only print warnings and errors')
    .action(async (ticket: string | undefined, options: ExportCommandOptions) => {
      process.exitCode = await runExport(ticket, options, deps);
    });

  return program;
}
