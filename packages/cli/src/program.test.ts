import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { InvalidArgumentError } from 'commander';
import type { Container } from 'inversify';
import {
  AuthError,
  ConsoleLogger,
  ExitCode,
  LogLevel,
  NotFoundError,
  TYPES,
  type ExportReport,
  type ExportScope,
  type IExportService,
} from '@strata/core';
import { buildProgram, parseTicketKey, runExport, type CliDependencies } from './program';

const env = {
  JIRA_URL: 'https://jira.example.com',
  JIRA_PROJECT: 'DEMO',
  JIRA_USERNAME: 'tester@example.com',
  JIRA_API_TOKEN: 'test-secret',
};

function reportFor(scope: ExportScope, failures: ExportReport['failures'] = []): ExportReport {
  return {
    scope,
    outputDir: `${process.cwd()}/tickets`,
    written: [{ key: 'DEMO-1', level: 'initiative', directory: 'INI-DEMO-1-Relaunch', files: ['DEMO-1.md'] }],
    failures,
  };
}

describe('parseTicketKey', () => {
  it('should accept and upper-case ticket keys', () => {
    expect(parseTicketKey('demo-42')).toBe('DEMO-42');
    expect(parseTicketKey(' DEMO-7 ')).toBe('DEMO-7');
  });

  it('should reject values that are not ticket keys', () => {
    expect(() => parseTicketKey('DEMO')).toThrow(InvalidArgumentError);
    expect(() => parseTicketKey('42')).toThrow(InvalidArgumentError);
    expect(() => parseTicketKey('DEMO-1 OR project = X')).toThrow(InvalidArgumentError);
  });
});

describe('runExport', () => {
  let run: Mock<IExportService['run']>;
  let createContainer: Mock<CliDependencies['createContainer']>;
  let logger: ConsoleLogger;
  let deps: CliDependencies;

  beforeEach(() => {
    run = vi.fn(async (scope: ExportScope) => reportFor(scope));
    const service: IExportService = { run };
    const container: Pick<Container, 'get'> = {
      get: <T>(token: unknown) => {
        if (token !== TYPES.IExportService) throw new Error(`unexpected lookup ${String(token)}`);
        return service as unknown as T;
      },
    };
    createContainer = vi.fn(() => container as Container);
    logger = new ConsoleLogger(LogLevel.INFO);
    deps = { env, logger, createContainer };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should export the configured project without a ticket', async () => {
    const code = await runExport(undefined, {}, deps);

    expect(code).toBe(ExitCode.Success);
    expect(run).toHaveBeenCalledWith({ kind: 'project', projectKey: 'DEMO' });
    expect(console.log).toHaveBeenCalledWith(`Exported 1 ticket from project DEMO into 'tickets/'`);
  });

  it('should export a single ticket, recursively when asked', async () => {
    await runExport('DEMO-2', { recursive: true }, deps);
    await runExport('DEMO-3', {}, deps);

    expect(run).toHaveBeenNthCalledWith(1, { kind: 'ticket', key: 'DEMO-2', recursive: true });
    expect(run).toHaveBeenNthCalledWith(2, { kind: 'ticket', key: 'DEMO-3', recursive: false });
  });

  it('should pass command line overrides into the config', async () => {
    await runExport(undefined, { output: 'out', clean: true, metadata: true, comments: false, openOnly: true }, deps);

    const [config] = createContainer.mock.calls[0];
    expect(config.outputDir).toBe('out');
    expect(config.clean).toBe(true);
    expect(config.writeMetadata).toBe(true);
    expect(config.includeComments).toBe(false);
    expect(config.openOnly).toBe(true);
  });

  it('should fail with the config exit code before building anything', async () => {
    const code = await runExport('DEMO-1', {}, { ...deps, env: { JIRA_URL: 'https://jira.example.com' } });

    expect(code).toBe(ExitCode.Config);
    expect(createContainer).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledWith('Error: Missing required environment variables: JIRA_PROJECT, JIRA_USERNAME, JIRA_API_TOKEN');
  });

  it('should exit with the not-found code for an unknown ticket', async () => {
    run.mockRejectedValueOnce(new NotFoundError('Ticket DEMO-2 does not exist or is not visible to tester@example.com', { key: 'DEMO-2' }));

    const code = await runExport('DEMO-2', {}, deps);

    expect(code).toBe(ExitCode.NotFound);
    expect(console.error).toHaveBeenCalledWith('Error: Ticket DEMO-2 does not exist or is not visible to tester@example.com');
  });

  it('should exit with the auth code when credentials are rejected', async () => {
    run.mockRejectedValueOnce(new AuthError('Jira rejected the credentials (401)'));

    await expect(runExport(undefined, {}, deps)).resolves.toBe(ExitCode.Auth);
  });

  it('should exit non-zero when some tickets failed', async () => {
    run.mockImplementationOnce(async (scope: ExportScope) => reportFor(scope, [{ key: 'DEMO-3', error: new Error('disk said no') }]));

    const code = await runExport(undefined, {}, deps);

    expect(code).toBe(ExitCode.Failure);
    expect(console.log).toHaveBeenCalledWith('- DEMO-3: disk said no');
  });

  it('should report unexpected errors with a generic failure code', async () => {
    run.mockRejectedValueOnce(new RangeError('boom'));

    const code = await runExport(undefined, {}, deps);

    expect(code).toBe(ExitCode.Failure);
    expect(console.error).toHaveBeenCalledWith('Error: Unexpected failure: boom');
  });

  it('should warn that --recursive needs a ticket', async () => {
    const warn = vi.spyOn(logger, 'warn');

    await runExport(undefined, { recursive: true }, deps);

    expect(warn).toHaveBeenCalledWith('--recursive has no effect without a ticket; exporting the whole project');
    expect(run).toHaveBeenCalledWith({ kind: 'project', projectKey: 'DEMO' });
  });

  it('should silence info output with --quiet', async () => {
    await runExport(undefined, { quiet: true }, deps);

    expect(console.log).not.toHaveBeenCalled();
  });
});

describe('buildProgram', () => {
  let previousExitCode: typeof process.exitCode;

  beforeEach(() => {
    previousExitCode = process.exitCode;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    process.exitCode = previousExitCode;
    vi.restoreAllMocks();
  });

  it('should parse the ticket argument and flags into an export', async () => {
    const service: IExportService = { run: vi.fn(async (scope: ExportScope) => reportFor(scope)) };
    const createContainer = vi.fn();
    const deps: CliDependencies = {
      env,
      logger: new ConsoleLogger(LogLevel.INFO),
      createContainer: config => {
        createContainer(config);
        const container: Pick<Container, 'get'> = { get: <T>() => service as unknown as T };
        return container as Container;
      },
    };

    await buildProgram(deps).parseAsync(['node', 'strata', 'demo-2', '--recursive', '-o', 'export', '--no-comments']);

    expect(service.run).toHaveBeenCalledWith({ kind: 'ticket', key: 'DEMO-2', recursive: true });
    expect(createContainer.mock.calls[0][0]).toMatchObject({ outputDir: 'export', includeComments: false, clean: false });
    expect(process.exitCode).toBe(ExitCode.Success);
  });
});
