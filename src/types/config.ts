/**
 * Type definitions for the fetcher configuration file
 */

export interface FetcherConfig {
  catalog_api: ApiConfig;
  output: OutputConfig;
}

export interface ApiConfig {
  base_url: string;
  endpoint: string;
  timeout: number;
  page_size: number;
  retry: RetryConfig;
}

export interface RetryConfig {
  /** Retries after the first attempt */
  max_retries: number;
  backoff_factor: number;
  status_forcelist: number[];
  /** Upper bound of a single backoff delay, in seconds */
  backoff_max: number;
}

export interface OutputConfig {
  enabled: boolean;
  directory: string;
  filename: string;
}

export interface Credentials {
  readonly publicKey: string;
  readonly privateKey: string;
}
