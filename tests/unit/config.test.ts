/**
 * Configuration tests
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { defaultConfig, loadConfig, loadCredentials, mergeWithDefaults, validateConfig } from '../../src/config';
import { MissingCredentialsError } from '../../src/errors';

describe('loadConfig', () => {
  let dir: string;

  const writeConfig = (content: string): string => {
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('falls back to the defaults when the file is missing', async () => {
    const config = await loadConfig(path.join(dir, 'absent.yaml'), {});

    expect(config).toEqual(defaultConfig);
    expect(console.warn).toHaveBeenCalledWith(`Warning: config file ${path.join(dir, 'absent.yaml')} not found, using defaults.`);
  });

  it('matches the defaults with the bundled config.yaml', async () => {
    const config = await loadConfig(path.join(__dirname, '../../config.yaml'), {});

    expect(config).toEqual(defaultConfig);
  });

  it('merges a partial file over the defaults', async () => {
    const file = writeConfig([
      'catalog_api:',
      '  page_size: 50',
      '  retry:',
      '    max_retries: 3',
      'output:',
      '  enabled: true'
    ].join('\n'));

    const config = await loadConfig(file, {});

    expect(config.catalog_api.page_size).toBe(50);
    expect(config.catalog_api.timeout).toBe(30000);
    expect(config.catalog_api.retry).toEqual({
      max_retries: 3,
      backoff_factor: 2,
      status_forcelist: [500, 502, 504],
      backoff_max: 120
    });
    expect(config.output).toEqual({ enabled: true, directory: './data', filename: 'characters.csv' });
  });

  it('treats an empty file as no overrides', async () => {
    const config = await loadConfig(writeConfig(''), {});

    expect(config).toEqual(defaultConfig);
  });

  it('takes the base URL from CATALOG_API_BASE_URL', async () => {
    const config = await loadConfig(writeConfig(''), { CATALOG_API_BASE_URL: 'http://localhost:8080/v1/public/' });

    expect(config.catalog_api.base_url).toBe('http://localhost:8080/v1/public/');
  });

  it('rejects a page size above the API limit', async () => {
    const file = writeConfig('catalog_api:\n  page_size: 500\n');

    await expect(loadConfig(file, {})).rejects.toThrow('catalog_api.page_size must be between 1 and 100, got 500');
  });

  it('rejects a file that is not a mapping', async () => {
    await expect(loadConfig(writeConfig('- one\n- two\n'), {})).rejects.toThrow('Config file must contain a YAML mapping');
  });

  it('rejects a value of the wrong type', async () => {
    const file = writeConfig('catalog_api:\n  timeout: fast\n');

    await expect(loadConfig(file, {})).rejects.toThrow('catalog_api.timeout must be a number, got "fast"');
  });

  it('reports YAML syntax errors with the file name', async () => {
    const file = writeConfig('catalog_api: [unclosed\n');

    await expect(loadConfig(file, {})).rejects.toThrow(`Failed to read config file ${file}`);
  });
});

describe('validateConfig', () => {
  const withRetry = (retry: Record<string, unknown>) =>
    mergeWithDefaults({ catalog_api: { retry } });

  it('accepts the defaults', () => {
    expect(() => validateConfig(mergeWithDefaults({}))).not.toThrow();
  });

  it('rejects a negative retry count', () => {
    expect(() => validateConfig(withRetry({ max_retries: -1 })))
      .toThrow('catalog_api.retry.max_retries must be a non-negative integer, got -1');
  });

  it('rejects status codes outside the HTTP range', () => {
    expect(() => validateConfig(withRetry({ status_forcelist: [502, 999] })))
      .toThrow('catalog_api.retry.status_forcelist must be a list of HTTP status codes');
  });

  it('rejects a zero timeout', () => {
    expect(() => validateConfig(mergeWithDefaults({ catalog_api: { timeout: 0 } })))
      .toThrow('catalog_api.timeout must be a positive integer (ms), got 0');
  });

  it('requires a directory when output is enabled', () => {
    expect(() => validateConfig(mergeWithDefaults({ output: { enabled: true, directory: '' } })))
      .toThrow('output.directory is not set.');
  });
});

describe('loadCredentials', () => {
  it('reads both keys', () => {
    expect(loadCredentials({ PUBLIC_KEY: 'test-public', PRIVATE_KEY: 'test-private' }))
      .toEqual({ publicKey: 'test-public', privateKey: 'test-private' });
  });

  it('names every missing key', () => {
    const error = (() => {
      try {
        loadCredentials({});
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(MissingCredentialsError);
    expect(error).toMatchObject({
      missing: ['PUBLIC_KEY', 'PRIVATE_KEY'],
      message: 'Missing credentials: set PUBLIC_KEY and PRIVATE_KEY in the environment'
    });
  });

  it('treats an empty value as missing', () => {
    expect(() => loadCredentials({ PUBLIC_KEY: 'test-public', PRIVATE_KEY: '' }))
      .toThrow('Missing credentials: set PRIVATE_KEY in the environment');
  });
});
