import axios, { type AxiosInstance } from 'axios';
import { AuthError, ExportError, NotFoundError, TransportError, describeError } from './errors';
import type { ExporterConfig } from './types';

/** The slice of axios the ticket client needs; tests substitute a `vi.fn()` here. */
export type JiraHttp = Pick<AxiosInstance, 'get'>;

export function createHttpClient(config: Pick<ExporterConfig, 'baseUrl' | 'username' | 'apiToken'>): AxiosInstance {
  const client = axios.create({
    baseURL: `${config.baseUrl}/rest/api/3`,
    auth: {
      username: config.username,
      password: config.apiToken,
    },
    headers: {
      Accept: 'application/json',
    },
  });

  client.interceptors.response.use(
    response => response,
    error => Promise.reject(toExportError(error))
  );

  return client;
}

/**
 * Maps an axios failure onto the exporter's error taxonomy.
 */
export function toExportError(error: unknown): ExportError {
  if (error instanceof ExportError) {
    return error;
  }

  if (!axios.isAxiosError(error)) {
    return new TransportError(`Jira request failed: ${describeError(error)}`, { cause: error });
  }

  const target = error.config?.url ? ` for ${error.config.url}` : '';

  if (!error.response) {
    return new TransportError(`No response from Jira${target}: ${error.message}`, { cause: error });
  }

  const { status, statusText, data } = error.response;
  const detail = extractJiraMessages(data);
  const suffix = detail ? `: ${detail}` : '';

  if (status === 401) {
    return new AuthError(`Jira rejected the credentials (401)${suffix}. Check JIRA_USERNAME and JIRA_API_TOKEN`, { status, cause: error });
  }
  if (status === 403) {
    return new AuthError(`Jira denied access${target} (403)${suffix}`, { status, cause: error });
  }
  if (status === 404) {
    return new NotFoundError(`Jira resource not found${target}${suffix}`, { cause: error });
  }
  return new TransportError(`Jira responded with ${status}${statusText ? ` ${statusText}` : ''}${target}${suffix}`, { status, cause: error });
}

/**
 * Jira error bodies carry `errorMessages: string[]` and `errors: Record<string, string>`.
 */
export function extractJiraMessages(data: unknown): string {
  if (typeof data !== 'object' || data === null) {
    return typeof data === 'string' ? data.trim() : '';
  }
  const messages: string[] = [];
  if ('errorMessages' in data && Array.isArray(data.errorMessages)) {
    for (const message of data.errorMessages) {
      if (typeof message === 'string') messages.push(message);
    }
  }
  if ('errors' in data && typeof data.errors === 'object' && data.errors !== null) {
    for (const [field, message] of Object.entries(data.errors)) {
      if (typeof message === 'string') messages.push(`${field}: ${message}`);
    }
  }
  return messages.join('; ');
}
