/**
 * HTTP communication module
 * Single GET requests with bounded retry on transient failures
 */
import * as http from 'http';
import * as https from 'https';
import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { ApiConfig } from '../types/config';
import { RequestAbortedError, RequestFailedError } from '../errors';
import { createRetryPolicy, RetryPolicy } from './retry-policy';
import { sleep } from '../utils/time-utils';

export type QueryParams = Record<string, string>;

export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface HttpClientOptions {
  /** Replaces the policy built from config.retry */
  retryPolicy?: RetryPolicy;
  /** Replaces the timer used between attempts */
  sleep?: SleepFunction;
  /** Replaces axios' network adapter, e.g. with an in-process stand-in */
  adapter?: AxiosAdapter;
  verbose?: boolean;
}

/**
 * HTTP client class
 */
export class HttpClient {
  private client: AxiosInstance;
  private retryPolicy: RetryPolicy;
  private sleep: SleepFunction;
  private verbose: boolean;

  /**
   * @param config API settings
   * @param options test and policy overrides
   */
  constructor(config: ApiConfig, options: HttpClientOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? createRetryPolicy(config.retry);
    this.sleep = options.sleep ?? sleep;
    this.verbose = options.verbose ?? false;

    this.client = axios.create({
      baseURL: config.base_url,
      timeout: config.timeout,
      headers: {
        'Accept': 'application/json',
      },
      httpAgent: new http.Agent({ keepAlive: true }),
      httpsAgent: new https.Agent({ keepAlive: true }),
      // status codes are classified by the retry loop, not by axios
      validateStatus: () => true,
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });
  }

  /**
   * Sends a GET request, retrying transient failures
   * @param endpoint path relative to the base URL
   * @param params query parameters
   * @param signal aborts the request and any pending backoff
   * @returns decoded JSON body of the 200 response
   * @throws RequestFailedError on a non-retryable status or once retries run out
   * @throws RequestAbortedError when the signal fires
   */
  async get(endpoint: string, params: QueryParams, signal?: AbortSignal): Promise<unknown> {
    const maxAttempts = this.retryPolicy.maxRetries + 1;
    let lastStatus: number | undefined;
    let lastBody: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = this.retryPolicy.backoffMs(attempt - 1);
        console.warn(`Retrying GET ${endpoint} in ${delay}ms (attempt ${attempt}/${maxAttempts})`);
        await this.wait(delay, signal);
      }

      if (this.verbose) {
        console.log(`GET ${endpoint} offset=${params.offset ?? '-'} (attempt ${attempt}/${maxAttempts})`);
      }

      let response: AxiosResponse<unknown>;
      try {
        response = await this.client.get<unknown>(endpoint, { params, signal });
      } catch (error) {
        if (signal?.aborted || axios.isCancel(error)) {
          throw new RequestAbortedError(`GET ${endpoint} aborted`);
        }
        // no response at all: connection reset, DNS failure, timeout
        if (axios.isAxiosError(error) && !error.response) {
          lastStatus = undefined;
          lastBody = error.message;
          console.warn(`GET ${endpoint} failed (attempt ${attempt}/${maxAttempts}): ${error.message}`);
          continue;
        }
        throw error;
      }

      if (response.status === 200) {
        return response.data;
      }

      if (!this.retryPolicy.shouldRetryStatus(response.status)) {
        throw new RequestFailedError(`GET ${endpoint} failed with status ${response.status}`, {
          statusCode: response.status,
          body: response.data,
          attempts: attempt
        });
      }

      lastStatus = response.status;
      lastBody = response.data;
      console.warn(`GET ${endpoint} returned ${response.status} (attempt ${attempt}/${maxAttempts})`);
    }

    const reason = lastStatus === undefined ? 'no response' : `status ${lastStatus}`;
    throw new RequestFailedError(`GET ${endpoint} failed after ${maxAttempts} attempts (${reason})`, {
      statusCode: lastStatus,
      body: lastBody,
      attempts: maxAttempts
    });
  }

  /**
   * Backoff wait that turns an abort into RequestAbortedError
   */
  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    try {
      await this.sleep(ms, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new RequestAbortedError('Aborted while waiting to retry');
      }
      throw error;
    }
  }
}
