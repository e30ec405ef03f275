/**
 * Service configuration read from environment variables.
 * A `.env` file in the working directory is loaded by `loadEnvFile()`;
 * variables already set in the process take precedence.
 */

import dotenv from 'dotenv';
import { DEFAULT_REDSHIFT_PORT } from './redshift/defaults.js';

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.missing = missing;
  }
}

export interface JiraConfig {
  baseUrl: string;
  email: string;
  apiToken: string;
  /** Field holding acceptance criteria; differs per Jira site */
  acceptanceCriteriaField: string;
}

export interface ConfluenceConfig {
  baseUrl: string;
  username: string;
  apiToken: string;
  personalSpace: string;
  /** Cloud sites serve the REST API under /wiki */
  isCloud: boolean;
}

export interface RedshiftConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export function loadEnvFile(path?: string): string | null {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error) return null;
  return path ?? '.env';
}

function requireVars<K extends string>(service: string, env: Env, names: readonly K[]): (name: K) => string {
  const missing = names.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigError(
      `${service} is not configured. Missing environment variables: ${missing.join(', ')}`,
      missing,
    );
  }
  return (name) => (env[name] ?? '').trim();
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

export function loadJiraConfig(env: Env = process.env): JiraConfig {
  const vars = requireVars('Jira', env, ['JIRA_URL', 'JIRA_EMAIL', 'JIRA_API_TOKEN'] as const);
  return {
    baseUrl: stripTrailingSlash(vars('JIRA_URL')),
    email: vars('JIRA_EMAIL'),
    apiToken: vars('JIRA_API_TOKEN'),
    acceptanceCriteriaField: env.JIRA_ACCEPTANCE_CRITERIA_FIELD?.trim() || 'customfield_10000',
  };
}

export function loadConfluenceConfig(env: Env = process.env): ConfluenceConfig {
  const vars = requireVars('Confluence', env, [
    'CONFLUENCE_URL',
    'CONFLUENCE_USERNAME',
    'CONFLUENCE_API_TOKEN',
    'CONFLUENCE_PERSONAL_SPACE',
  ] as const);
  const cloudFlag = env.CONFLUENCE_IS_CLOUD?.trim().toLowerCase();
  return {
    baseUrl: stripTrailingSlash(vars('CONFLUENCE_URL')),
    username: vars('CONFLUENCE_USERNAME'),
    apiToken: vars('CONFLUENCE_API_TOKEN'),
    personalSpace: vars('CONFLUENCE_PERSONAL_SPACE'),
    isCloud: cloudFlag !== 'false' && cloudFlag !== '0',
  };
}

export function loadRedshiftConfig(env: Env = process.env): RedshiftConfig {
  const vars = requireVars('Redshift', env, [
    'REDSHIFT_HOST',
    'REDSHIFT_DATABASE',
    'REDSHIFT_USER',
    'REDSHIFT_PASSWORD',
  ] as const);
  const rawPort = env.REDSHIFT_PORT?.trim() || String(DEFAULT_REDSHIFT_PORT);
  const port = parseInt(rawPort, 10);
  if (!Number.isFinite(port) || port <= 0 || port > 65535) {
    throw new ConfigError(`Invalid REDSHIFT_PORT "${rawPort}". Expected 1-65535.`);
  }
  return {
    host: vars('REDSHIFT_HOST'),
    port,
    database: vars('REDSHIFT_DATABASE'),
    user: vars('REDSHIFT_USER'),
    password: vars('REDSHIFT_PASSWORD'),
  };
}
