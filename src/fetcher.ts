/**
 * Fetcher module
 * Runs the extraction: paginate, shape, optionally export
 */
import { ExtractorParams, ExtractorResult, RuntimeOptions } from './types/options';
import { Credentials, FetcherConfig } from './types/config';
import { Dataset } from './types/data';
import { ApiClient, ApiClientOptions, PageProgress } from './api-client';
import { shapeRecords } from './shaper';
import { CsvFormatter } from './formatters/csv';
import { loadCredentials } from './config';

/**
 * Fetches the whole catalog and shapes it
 * Any failure aborts the walk; no partial dataset is returned.
 * @returns dataset with one row per character, in server order
 */
export async function fetchCharacters(
  config: FetcherConfig,
  credentials: Credentials,
  options: RuntimeOptions = {},
  clientOptions: ApiClientOptions = {},
  onPage?: (progress: PageProgress) => void
): Promise<Dataset> {
  const apiClient = new ApiClient(config.catalog_api, credentials, {
    verbose: options.verbose,
    ...clientOptions
  });

  const records = await apiClient.fetchWithPagination({
    pageSize: options.page_size ?? config.catalog_api.page_size,
    modifiedSince: options.modified_since,
    signal: options.signal,
    onPage
  });

  return shapeRecords(records);
}

/**
 * Core logic: reads credentials, fetches, shapes and exports
 * @param params extraction parameters
 * @returns execution result
 */
export async function extractCharacters(params: ExtractorParams): Promise<ExtractorResult> {
  const { config, options, env = process.env, client = {} } = params;
  const startTime = Date.now();

  try {
    // fails before any request when a key is missing
    const credentials = loadCredentials(env);

    console.log('Starting extraction');
    if (options.modified_since) {
      console.log(`Only characters modified since ${options.modified_since}`);
    }

    let pages = 0;
    const dataset = await fetchCharacters(config, credentials, options, client, progress => {
      pages = progress.page;
    });
    console.log('End extraction');

    let outputFile: string | undefined;
    const output = options.output_dir
      ? { ...config.output, enabled: true, directory: options.output_dir }
      : config.output;
    if (output.enabled) {
      const formatter = new CsvFormatter(output);
      outputFile = await formatter.writeData(dataset);
    }

    return {
      success: true,
      dataset,
      outputFile,
      stats: {
        totalRecords: dataset.length,
        pages,
        duration: Date.now() - startTime
      }
    };
  } catch (error) {
    return {
      success: false,
      error: error instanceof Error ? error : new Error(String(error))
    };
  }
}
