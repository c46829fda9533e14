export enum ExitCode {
  Success = 0,
  Failure = 1,
  Config = 2,
  Auth = 3,
  NotFound = 4,
  Transport = 5,
  Filesystem = 6,
}

/**
 * Base class for every failure the exporter knows how to report.
 * Each subclass maps to a process exit code.
 */
export abstract class ExportError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends ExportError {
  readonly exitCode = ExitCode.Config;
}

export class AuthError extends ExportError {
  readonly exitCode = ExitCode.Auth;
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class NotFoundError extends ExportError {
  readonly exitCode = ExitCode.NotFound;
  readonly key: string | undefined;

  constructor(message: string, options?: { key?: string; cause?: unknown }) {
    super(message, options);
    this.key = options?.key;
  }
}

export class TransportError extends ExportError {
  readonly exitCode = ExitCode.Transport;
  readonly status: number | undefined;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options);
    this.status = options?.status;
  }
}

export class FilesystemError extends ExportError {
  readonly exitCode = ExitCode.Filesystem;
  readonly path: string;
  readonly ticketKey: string | undefined;
  // Fatal errors abort the whole run instead of being collected per ticket
  readonly fatal: boolean;

  constructor(message: string, options: { path: string; ticketKey?: string; fatal?: boolean; cause?: unknown }) {
    super(message, options);
    this.path = options.path;
    this.ticketKey = options.ticketKey;
    this.fatal = options.fatal ?? false;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
