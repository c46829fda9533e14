import { describe, it, expect } from 'vitest';
import * as CoreExports from './index';

describe('Core Index Exports', () => {
  it('should export TYPES and createContainer', () => {
    expect(typeof CoreExports.TYPES.IExportService).toBe('symbol');
    expect(typeof CoreExports.createContainer).toBe('function');
  });

  it('should export the error taxonomy with distinct exit codes', () => {
    const errors = [
      new CoreExports.ConfigError('config'),
      new CoreExports.AuthError('auth'),
      new CoreExports.NotFoundError('missing'),
      new CoreExports.TransportError('transport'),
      new CoreExports.FilesystemError('disk', { path: '/tmp' }),
    ];

    expect(errors.map(e => e.name)).toEqual(['ConfigError', 'AuthError', 'NotFoundError', 'TransportError', 'FilesystemError']);
    expect(errors.map(e => e.exitCode)).toEqual([2, 3, 4, 5, 6]);
    expect(errors.every(e => e instanceof CoreExports.ExportError)).toBe(true);
  });

  it('should export the building blocks used by the CLI', () => {
    expect(typeof CoreExports.loadConfig).toBe('function');
    expect(typeof CoreExports.summarizeReport).toBe('function');
    expect(typeof CoreExports.ConsoleLogger).toBe('function');
    expect(CoreExports.LogLevel.DEBUG).toBe(0);
  });
});
