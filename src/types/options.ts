/**
 * Runtime option types
 */
import { FetcherConfig } from './config';
import { Dataset } from './data';
import { ApiClientOptions } from '../api-client';

export interface RuntimeOptions {
  /**
   * Records requested per page.
   * Falls back to catalog_api.page_size in config.yaml
   */
  page_size?: number;

  /**
   * Only return characters modified on or after this date
   * e.g. "2014-01-01" or "2014-01-01T00:00:00Z"
   */
  modified_since?: string;

  /**
   * CSV output directory. Setting it enables the CSV sink
   */
  output_dir?: string;

  /**
   * Log every page request
   */
  verbose?: boolean;

  /**
   * Aborts the extraction mid-walk
   */
  signal?: AbortSignal;
}

/**
 * Command line options
 */
export type CliOptions = {
  configFile: string;
  pageSize?: number;
  modifiedSince?: string;
  outputDir?: string;
  baseUrl?: string;
  verbose: boolean;
};

export interface ExtractorStats {
  totalRecords: number;
  pages: number;
  duration: number;
}

export type ExtractorResult =
  | {
      success: true;
      dataset: Dataset;
      outputFile?: string;
      stats: ExtractorStats;
    }
  | {
      success: false;
      error: Error;
    };

export interface ExtractorParams {
  config: FetcherConfig;
  options: RuntimeOptions;
  /** Where the API keys are read from; defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Transport overrides (adapter, sleep, clock) */
  client?: ApiClientOptions;
}
