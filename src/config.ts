/**
 * Configuration loading and validation
 */
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { Credentials, FetcherConfig } from './types/config';
import { DEFAULT_RETRY_CONFIG } from './io/retry-policy';
import { MissingCredentialsError, describeError } from './errors';
import { isRecord } from './utils/type-guards';

/**
 * Upper bound the API accepts for `limit`
 */
export const MAX_PAGE_SIZE = 100;

/**
 * Default settings
 */
export const defaultConfig: FetcherConfig = {
  catalog_api: {
    base_url: 'https://gateway.marvel.com/v1/public/',
    endpoint: 'characters',
    timeout: 30000,
    page_size: MAX_PAGE_SIZE,
    retry: { ...DEFAULT_RETRY_CONFIG }
  },
  output: {
    enabled: false,
    directory: './data',
    filename: 'characters.csv'
  }
};

/**
 * Reads and validates the config file
 * @param configPath path of the YAML file (default: CATALOG_CONFIG_PATH or './config.yaml')
 * @param env environment consulted for overrides
 * @returns merged settings
 */
export async function loadConfig(
  configPath: string = process.env.CATALOG_CONFIG_PATH || './config.yaml',
  env: NodeJS.ProcessEnv = process.env
): Promise<FetcherConfig> {
  let userConfig: unknown = {};

  if (!fs.existsSync(configPath)) {
    console.warn(`Warning: config file ${configPath} not found, using defaults.`);
  } else {
    try {
      const fileContent = await fs.promises.readFile(configPath, 'utf-8');
      userConfig = yaml.load(fileContent) ?? {};
    } catch (error) {
      throw new Error(`Failed to read config file ${configPath}: ${describeError(error)}`);
    }
  }

  const mergedConfig = mergeWithDefaults(userConfig);
  if (env.CATALOG_API_BASE_URL) {
    mergedConfig.catalog_api.base_url = env.CATALOG_API_BASE_URL;
  }

  validateConfig(mergedConfig);
  return mergedConfig;
}

/**
 * Merges user settings over the defaults, section by section
 */
export function mergeWithDefaults(userConfig: unknown): FetcherConfig {
  if (!isRecord(userConfig)) {
    throw new Error('Config file must contain a YAML mapping');
  }

  const api = section(userConfig, 'catalog_api');
  const retry = section(api, 'retry');
  const output = section(userConfig, 'output');

  const defaults = defaultConfig.catalog_api;
  return {
    catalog_api: {
      base_url: readString(api, 'base_url', defaults.base_url, 'catalog_api'),
      endpoint: readString(api, 'endpoint', defaults.endpoint, 'catalog_api'),
      timeout: readNumber(api, 'timeout', defaults.timeout, 'catalog_api'),
      page_size: readNumber(api, 'page_size', defaults.page_size, 'catalog_api'),
      retry: {
        max_retries: readNumber(retry, 'max_retries', defaults.retry.max_retries, 'catalog_api.retry'),
        backoff_factor: readNumber(retry, 'backoff_factor', defaults.retry.backoff_factor, 'catalog_api.retry'),
        status_forcelist: readNumberList(retry, 'status_forcelist', defaults.retry.status_forcelist, 'catalog_api.retry'),
        backoff_max: readNumber(retry, 'backoff_max', defaults.retry.backoff_max, 'catalog_api.retry')
      }
    },
    output: {
      enabled: readBoolean(output, 'enabled', defaultConfig.output.enabled, 'output'),
      directory: readString(output, 'directory', defaultConfig.output.directory, 'output'),
      filename: readString(output, 'filename', defaultConfig.output.filename, 'output')
    }
  };
}

/**
 * Basic validation
 * @throws validation error
 */
export function validateConfig(config: FetcherConfig): void {
  const { catalog_api: api, output } = config;

  if (typeof api.base_url !== 'string' || !api.base_url) {
    throw new Error('catalog_api.base_url is not set.');
  }
  if (typeof api.endpoint !== 'string' || !api.endpoint) {
    throw new Error('catalog_api.endpoint is not set.');
  }
  if (!isPositiveInteger(api.timeout)) {
    throw new Error(`catalog_api.timeout must be a positive integer (ms), got ${api.timeout}`);
  }
  if (!isPositiveInteger(api.page_size) || api.page_size > MAX_PAGE_SIZE) {
    throw new Error(`catalog_api.page_size must be between 1 and ${MAX_PAGE_SIZE}, got ${api.page_size}`);
  }

  const { retry } = api;
  if (!Number.isInteger(retry.max_retries) || retry.max_retries < 0) {
    throw new Error(`catalog_api.retry.max_retries must be a non-negative integer, got ${retry.max_retries}`);
  }
  if (typeof retry.backoff_factor !== 'number' || retry.backoff_factor < 0) {
    throw new Error(`catalog_api.retry.backoff_factor must be a non-negative number, got ${retry.backoff_factor}`);
  }
  if (typeof retry.backoff_max !== 'number' || retry.backoff_max < 0) {
    throw new Error(`catalog_api.retry.backoff_max must be a non-negative number, got ${retry.backoff_max}`);
  }
  if (!Array.isArray(retry.status_forcelist) || !retry.status_forcelist.every(isHttpStatus)) {
    throw new Error('catalog_api.retry.status_forcelist must be a list of HTTP status codes');
  }

  if (output.enabled && (typeof output.directory !== 'string' || !output.directory)) {
    throw new Error('output.directory is not set.');
  }
  if (typeof output.filename !== 'string' || !output.filename) {
    throw new Error('output.filename is not set.');
  }
}

/**
 * Reads the API keys from the environment
 * @throws MissingCredentialsError listing every absent variable
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  const publicKey = env.PUBLIC_KEY;
  const privateKey = env.PRIVATE_KEY;

  if (!publicKey || !privateKey) {
    const missing: string[] = [];
    if (!publicKey) missing.push('PUBLIC_KEY');
    if (!privateKey) missing.push('PRIVATE_KEY');
    throw new MissingCredentialsError(missing);
  }

  return Object.freeze({ publicKey, privateKey });
}

function section(parent: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = parent[key];
  return isRecord(value) ? value : {};
}

function readString(source: Record<string, unknown>, key: string, fallback: string, prefix: string): string {
  const value = source[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'string') {
    throw new Error(`${prefix}.${key} must be a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readNumber(source: Record<string, unknown>, key: string, fallback: number, prefix: string): number {
  const value = source[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'number') {
    throw new Error(`${prefix}.${key} must be a number, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, key: string, fallback: boolean, prefix: string): boolean {
  const value = source[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value !== 'boolean') {
    throw new Error(`${prefix}.${key} must be true or false, got ${JSON.stringify(value)}`);
  }
  return value;
}

function readNumberList(source: Record<string, unknown>, key: string, fallback: number[], prefix: string): number[] {
  const value = source[key];
  if (value === undefined || value === null) return [...fallback];
  if (!Array.isArray(value) || !value.every((item): item is number => typeof item === 'number')) {
    throw new Error(`${prefix}.${key} must be a list of HTTP status codes`);
  }
  return [...value];
}

function isPositiveInteger(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isHttpStatus(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value >= 100 && value <= 599;
}
