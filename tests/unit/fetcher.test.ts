/**
 * Extraction tests
 * Pagination, shaping and export against an in-process catalog
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { extractCharacters, fetchCharacters } from '../../src/fetcher';
import {
  ExtractionError,
  MalformedRecordError,
  MissingCredentialsError,
  RequestAbortedError,
  RequestFailedError
} from '../../src/errors';
import { testConfig, testCredentials, makeCharacter } from '../fixtures/test-data';
import { createCatalogServer, createHangingAdapter } from '../mocks/catalog-server.mock';

const testEnv = { PUBLIC_KEY: 'test-public', PRIVATE_KEY: 'test-private' };
const noSleep = () => Promise.resolve();

describe('fetchCharacters', () => {
  it('returns one shaped row per character reported by the first page', async () => {
    const server = createCatalogServer({ total: 250 });

    const dataset = await fetchCharacters(testConfig, testCredentials, { page_size: 100 }, {
      adapter: server.adapter,
      sleep: noSleep
    });

    expect(dataset).toHaveLength(250);
    expect(dataset[0]).toEqual({
      id: 1,
      name: 'Character 1',
      description: 'Description of character 1',
      comics: 1,
      series: 1,
      stories: 1,
      events: 1
    });
    expect(dataset[249]).toEqual({
      id: 250,
      name: 'Character 250',
      description: 'Description of character 250',
      comics: 0,
      series: 10,
      stories: 10,
      events: 2
    });
  });

  it('propagates transport failures unchanged', async () => {
    const server = createCatalogServer({ total: 250, failuresAtOffset: { 200: [401] } });

    await expect(
      fetchCharacters(testConfig, testCredentials, { page_size: 100 }, { adapter: server.adapter, sleep: noSleep })
    ).rejects.toMatchObject({ name: 'RequestFailedError', statusCode: 401 });
  });

  it('keeps concurrent extractions independent', async () => {
    const small = createCatalogServer({ total: 3 });
    const large = createCatalogServer({ total: 120, record: position => makeCharacter(1000 + position) });

    const [a, b] = await Promise.all([
      fetchCharacters(testConfig, testCredentials, { page_size: 100 }, { adapter: small.adapter, sleep: noSleep }),
      fetchCharacters(testConfig, testCredentials, { page_size: 100 }, { adapter: large.adapter, sleep: noSleep })
    ]);

    expect(a.map(row => row.id)).toEqual([1, 2, 3]);
    expect(b).toHaveLength(120);
    expect(b[0].id).toBe(1000);
  });
});

describe('extractCharacters', () => {
  it('fails with MissingCredentialsError before any request', async () => {
    const server = createCatalogServer({ total: 10 });

    const result = await extractCharacters({
      config: testConfig,
      options: {},
      env: { PUBLIC_KEY: 'test-public' },
      client: { adapter: server.adapter, sleep: noSleep }
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(MissingCredentialsError);
      expect(result.error).toBeInstanceOf(ExtractionError);
    }
    expect(server.adapter).not.toHaveBeenCalled();
  });

  it('reports the dataset and run statistics', async () => {
    const server = createCatalogServer({ total: 250 });

    const result = await extractCharacters({
      config: testConfig,
      options: { page_size: 100, modified_since: '2014-01-01' },
      env: testEnv,
      client: { adapter: server.adapter, sleep: noSleep }
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.dataset).toHaveLength(250);
      expect(result.stats.totalRecords).toBe(250);
      expect(result.stats.pages).toBe(3);
      expect(result.outputFile).toBeUndefined();
    }
    expect(server.requests.every(request => request.params.modifiedSince === '2014-01-01')).toBe(true);
  });

  it('surfaces a failed page as a failed run without a dataset', async () => {
    const server = createCatalogServer({ total: 250, failuresAtOffset: { 100: [500, 500, 500, 500, 500, 500] } });

    const result = await extractCharacters({
      config: testConfig,
      options: { page_size: 100 },
      env: testEnv,
      client: { adapter: server.adapter, sleep: noSleep }
    });

    expect(result).toEqual({ success: false, error: expect.any(RequestFailedError) });
    expect(server.requests).toHaveLength(7);
  });

  it('surfaces a malformed record', async () => {
    const server = createCatalogServer({
      total: 2,
      record: position => (position === 1 ? { ...makeCharacter(2), stories: {} } : makeCharacter(1))
    });

    const result = await extractCharacters({
      config: testConfig,
      options: {},
      env: testEnv,
      client: { adapter: server.adapter, sleep: noSleep }
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(MalformedRecordError);
      expect(result.error).toMatchObject({ field: 'stories', index: 1 });
    }
  });

  it('stops when the signal has aborted', async () => {
    const server = createCatalogServer({ total: 10 });
    const controller = new AbortController();
    controller.abort();

    const result = await extractCharacters({
      config: testConfig,
      options: { signal: controller.signal },
      env: testEnv,
      client: { adapter: server.adapter, sleep: noSleep }
    });

    expect(result).toEqual({ success: false, error: expect.any(RequestAbortedError) });
  });

  it('cancels the walk while a page request is in flight', async () => {
    const controller = new AbortController();
    const adapter = createHangingAdapter(() => controller.abort());

    const result = await extractCharacters({
      config: testConfig,
      options: { signal: controller.signal },
      env: testEnv,
      client: { adapter, sleep: noSleep }
    });

    expect(result).toEqual({ success: false, error: expect.any(RequestAbortedError) });
    expect(adapter).toHaveBeenCalledTimes(1);
  });

  describe('CSV export', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'catalog-output-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('writes characters.csv into output_dir', async () => {
      const server = createCatalogServer({ total: 3 });
      const outputDir = path.join(dir, 'nested');

      const result = await extractCharacters({
        config: testConfig,
        options: { output_dir: outputDir },
        env: testEnv,
        client: { adapter: server.adapter, sleep: noSleep }
      });

      const expectedFile = path.join(outputDir, 'characters.csv');
      expect(result).toMatchObject({ success: true, outputFile: expectedFile });
      expect(fs.readFileSync(expectedFile, 'utf-8')).toBe([
        'id,name,description,comics,series,stories,events',
        '1,Character 1,Description of character 1,1,1,1,1',
        '2,Character 2,Description of character 2,2,2,2,2',
        '3,Character 3,,3,3,3,3',
        ''
      ].join('\n'));
    });

    it('follows output.enabled from the config', async () => {
      const server = createCatalogServer({ total: 1 });

      const result = await extractCharacters({
        config: { ...testConfig, output: { enabled: true, directory: dir, filename: 'all.csv' } },
        options: {},
        env: testEnv,
        client: { adapter: server.adapter, sleep: noSleep }
      });

      expect(result).toMatchObject({ success: true, outputFile: path.join(dir, 'all.csv') });
      expect(fs.existsSync(path.join(dir, 'all.csv'))).toBe(true);
    });
  });
});
