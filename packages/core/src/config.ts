import { ConfigError } from './errors';
import type { ExporterConfig } from './types';

export const REQUIRED_ENV_VARS = ['JIRA_URL', 'JIRA_PROJECT', 'JIRA_USERNAME', 'JIRA_API_TOKEN'] as const;

export const DEFAULT_OUTPUT_DIR = 'tickets';
export const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 100;

const PROJECT_KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;
const EPIC_LINK_FIELD_PATTERN = /^customfield_\d+$/;

export type ConfigOverrides = Partial<
  Pick<ExporterConfig, 'outputDir' | 'includeComments' | 'writeMetadata' | 'openOnly' | 'clean'>
>;

/**
 * Builds the exporter configuration from environment variables.
 * All required variables are checked together so one run reports every gap.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): ExporterConfig {
  const missing = REQUIRED_ENV_VARS.filter(name => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const baseUrl = parseBaseUrl(readEnv(env, 'JIRA_URL'));

  const projectKey = readEnv(env, 'JIRA_PROJECT');
  if (!PROJECT_KEY_PATTERN.test(projectKey)) {
    throw new ConfigError(`JIRA_PROJECT "${projectKey}" is not a valid project key`);
  }

  const epicLinkField = env.JIRA_EPIC_LINK_FIELD?.trim() || null;
  if (epicLinkField !== null && !EPIC_LINK_FIELD_PATTERN.test(epicLinkField)) {
    throw new ConfigError(`JIRA_EPIC_LINK_FIELD must look like customfield_10014, got "${epicLinkField}"`);
  }

  return {
    baseUrl,
    projectKey: projectKey.toUpperCase(),
    username: readEnv(env, 'JIRA_USERNAME'),
    apiToken: readEnv(env, 'JIRA_API_TOKEN'),
    outputDir: overrides.outputDir ?? (env.STRATA_OUTPUT_DIR?.trim() || DEFAULT_OUTPUT_DIR),
    pageSize: parsePageSize(env.JIRA_PAGE_SIZE),
    epicLinkField,
    includeComments: overrides.includeComments ?? true,
    writeMetadata: overrides.writeMetadata ?? false,
    openOnly: overrides.openOnly ?? false,
    clean: overrides.clean ?? false,
  };
}

function readEnv(env: NodeJS.ProcessEnv, name: (typeof REQUIRED_ENV_VARS)[number]): string {
  return (env[name] ?? '').trim();
}

function parseBaseUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch (error) {
    throw new ConfigError(`JIRA_URL "${raw}" is not a valid URL`, { cause: error });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigError(`JIRA_URL must use http or https, got "${url.protocol}"`);
  }
  return raw.replace(/\/+$/, '');
}

function parsePageSize(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return DEFAULT_PAGE_SIZE;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1 || value > MAX_PAGE_SIZE) {
    throw new ConfigError(`JIRA_PAGE_SIZE must be an integer between 1 and ${MAX_PAGE_SIZE}, got "${raw}"`);
  }
  return value;
}
