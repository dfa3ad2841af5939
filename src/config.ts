/**
 * Configuration for a collection run
 *
 * Values come from CLI options first, then environment variables.
 */
import { StorefrontCredentials } from './types';
import { ConfigurationError } from './errors';
import { PaperlessConfig } from './modules/sinks/PaperlessUploader';
import { AmazonStorefrontOptions, DEFAULT_STOREFRONT_OPTIONS } from './modules/storefront/AmazonStorefront';
import { parseScheduleInterval } from './utils/schedule';

export const DEFAULT_DB_PATH = 'invoices.db';
export const DEFAULT_LOGIN_RETRIES = 2;
export const MAX_LOGIN_RETRIES = 3;

/**
 * Options as received from the command line
 */
export interface CollectCliOptions {
  email?: string;
  password?: string;
  minYear?: string;
  outputFolder?: string;
  dbPath?: string;
  paperlessUrl?: string;
  paperlessToken?: string;
  paperlessCorrespondent?: string;
  paperlessDocumentType?: string;
  paperlessTags?: string[];
  paperlessStoragePath?: string;
  loginRetries?: string;
  headless?: boolean;
  schedule?: string;
}

export interface CollectorConfig {
  credentials: StorefrontCredentials;
  minYear?: number;
  outputFolder?: string;
  dbPath: string;
  paperless?: PaperlessConfig;
  loginRetries: number;
  headless: boolean;
  chromePath?: string;
  /** Interval between scheduled runs, undefined for a single run */
  scheduleMs?: number;
  schedule?: string;
  storefront: AmazonStorefrontOptions;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Parse a positive integer option, e.g. a Paperless object id
 */
export function parseIntegerOption(name: string, value: string | undefined, min = 1): number | undefined {
  const raw = nonEmpty(value);
  if (raw === undefined) {
    return undefined;
  }
  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a whole number, got "${raw}"`);
  }
  const parsed = Number(raw);
  if (parsed < min) {
    throw new ConfigurationError(`${name} must be at least ${min}, got ${parsed}`);
  }
  return parsed;
}

function parseUrl(name: string, value: string): string {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    throw new ConfigurationError(`${name} is not a valid URL: ${value}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError(`${name} must use http or https: ${value}`);
  }
  return value.replace(/\/+$/, '');
}

function buildPaperlessConfig(
  options: CollectCliOptions,
  env: NodeJS.ProcessEnv
): PaperlessConfig | undefined {
  const url = nonEmpty(options.paperlessUrl) ?? nonEmpty(env.PAPERLESS_URL);
  const token = nonEmpty(options.paperlessToken) ?? nonEmpty(env.PAPERLESS_TOKEN);

  if (!url && !token) {
    return undefined;
  }
  if (!url || !token) {
    throw new ConfigurationError('--paperless-url and --paperless-token must be given together');
  }

  return {
    url: parseUrl('--paperless-url', url),
    token,
    correspondent: parseIntegerOption('--paperless-correspondent', options.paperlessCorrespondent),
    documentType: parseIntegerOption('--paperless-document-type', options.paperlessDocumentType),
    storagePath: parseIntegerOption('--paperless-storage-path', options.paperlessStoragePath),
    tags: (options.paperlessTags ?? []).map(tag => {
      const parsed = parseIntegerOption('--paperless-tags', tag);
      if (parsed === undefined) {
        throw new ConfigurationError('--paperless-tags must not contain empty values');
      }
      return parsed;
    }),
  };
}

/**
 * Merge and validate CLI options and environment.
 * Throws ConfigurationError before any browser work starts.
 */
export function buildCollectorConfig(
  options: CollectCliOptions,
  env: NodeJS.ProcessEnv = process.env
): CollectorConfig {
  const email = nonEmpty(options.email) ?? nonEmpty(env.STOREFRONT_EMAIL);
  const password = options.password || env.STOREFRONT_PASSWORD;
  if (!email || !password) {
    throw new ConfigurationError(
      'Storefront credentials are required (--email/--password or STOREFRONT_EMAIL/STOREFRONT_PASSWORD)'
    );
  }

  const outputFolder = nonEmpty(options.outputFolder) ?? nonEmpty(env.INVOICE_OUTPUT_FOLDER);
  const paperless = buildPaperlessConfig(options, env);
  if (!outputFolder && !paperless) {
    throw new ConfigurationError(
      'Either --output-folder or --paperless-url and --paperless-token must be specified'
    );
  }

  const loginRetries =
    parseIntegerOption('--login-retries', options.loginRetries, 0) ?? DEFAULT_LOGIN_RETRIES;
  if (loginRetries > MAX_LOGIN_RETRIES) {
    throw new ConfigurationError(`--login-retries must be between 0 and ${MAX_LOGIN_RETRIES}`);
  }

  const schedule = nonEmpty(options.schedule) ?? nonEmpty(env.SCHEDULE);

  return {
    credentials: { email, password },
    minYear: parseIntegerOption('--min-year', options.minYear, 1995),
    outputFolder,
    dbPath: nonEmpty(options.dbPath) ?? nonEmpty(env.INVOICE_DB_PATH) ?? DEFAULT_DB_PATH,
    paperless,
    loginRetries,
    headless: options.headless ?? true,
    chromePath: nonEmpty(env.CHROME_BIN),
    scheduleMs: schedule ? parseScheduleInterval(schedule) : undefined,
    schedule,
    storefront: {
      ...DEFAULT_STOREFRONT_OPTIONS,
      baseUrl: nonEmpty(env.STOREFRONT_BASE_URL) ?? DEFAULT_STOREFRONT_OPTIONS.baseUrl,
      loginUrl: nonEmpty(env.STOREFRONT_LOGIN_URL) ?? DEFAULT_STOREFRONT_OPTIONS.loginUrl,
    },
  };
}
