/**
 * @file config.ts
 * @module shared/config
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Runtime configuration: built-in defaults, overridden by
 * environment variables, overridden by command-line flags.
 */

import { resolve } from 'node:path';

import { DEFAULT_API_URL } from '../api/ModrinthGateway.js';
import { UserInputError, fail, ok, type Result } from './errors.js';

export const DEFAULT_DOWNLOAD_DIR = './downloads';
export const DEFAULT_PAGE_SIZE = 20;
/** Largest `limit` the search endpoint accepts */
export const MAX_PAGE_SIZE = 100;

/**
 * Environment variables read by resolveConfig.
 */
export const ENV_VARS = {
  apiUrl: 'MODSEARCH_API_URL',
  downloadDir: 'MODSEARCH_DOWNLOAD_DIR',
  pageSize: 'MODSEARCH_PAGE_SIZE',
} as const;

/**
 * Command-line options as parsed by commander.
 */
export interface CliOptions {
  output?: string;
  apiUrl?: string;
  pageSize?: string;
  verbose?: boolean;
}

export interface AppConfig {
  /** API root without trailing slash */
  apiUrl: string;
  /** Absolute download root */
  downloadDir: string;
  pageSize: number;
  verbose: boolean;
}

function parsePageSize(value: string, source: string): Result<number> {
  const size = /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(size) || size < 1 || size > MAX_PAGE_SIZE) {
    return fail(new UserInputError(`Invalid page size "${value}" from ${source}: expected 1-${MAX_PAGE_SIZE}`));
  }
  return ok(size);
}

function parseApiUrl(value: string, source: string): Result<string> {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return fail(new UserInputError(`Invalid API URL "${value}" from ${source}`));
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return fail(new UserInputError(`Invalid API URL "${value}" from ${source}: expected http or https`));
  }
  return ok(value.replace(/\/+$/, ''));
}

function pick(
  flag: string | undefined,
  env: NodeJS.ProcessEnv,
  name: string,
  flagName: string
): { value: string; source: string } | undefined {
  if (flag !== undefined) {
    return { value: flag, source: flagName };
  }
  const fromEnv = env[name];
  if (fromEnv !== undefined && fromEnv !== '') {
    return { value: fromEnv, source: name };
  }
  return undefined;
}

/**
 * Merge defaults, environment and flags into a validated configuration.
 *
 * @param options - Parsed command-line options
 * @param env - Environment (usually process.env)
 * @param cwd - Directory relative download paths resolve against
 */
export function resolveConfig(options: CliOptions, env: NodeJS.ProcessEnv, cwd = process.cwd()): Result<AppConfig> {
  let pageSize = DEFAULT_PAGE_SIZE;
  const pageSizeInput = pick(options.pageSize, env, ENV_VARS.pageSize, '--page-size');
  if (pageSizeInput) {
    const parsed = parsePageSize(pageSizeInput.value, pageSizeInput.source);
    if (!parsed.ok) {
      return parsed;
    }
    pageSize = parsed.value;
  }

  let apiUrl = DEFAULT_API_URL;
  const apiUrlInput = pick(options.apiUrl, env, ENV_VARS.apiUrl, '--api-url');
  if (apiUrlInput) {
    const parsed = parseApiUrl(apiUrlInput.value, apiUrlInput.source);
    if (!parsed.ok) {
      return parsed;
    }
    apiUrl = parsed.value;
  }

  const downloadDir = pick(options.output, env, ENV_VARS.downloadDir, '--output')?.value ?? DEFAULT_DOWNLOAD_DIR;

  return ok({
    apiUrl,
    downloadDir: resolve(cwd, downloadDir),
    pageSize,
    verbose: options.verbose ?? false,
  });
}
