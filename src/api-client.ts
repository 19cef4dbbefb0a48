/**
 * Character catalog API client
 * Signs each request and walks the offset cursor to the end of the catalog
 */
import { HttpClient, HttpClientOptions, QueryParams } from './io/http';
import { ApiConfig, Credentials } from './types/config';
import { CharacterPage, RawRecord } from './types/data';
import { createRequestSignature } from './auth/signer';
import { MalformedResponseError } from './errors';
import { isNonNegativeInteger, isRecord } from './utils/type-guards';

/**
 * Pagination parameters
 */
export interface FetchPageParams {
  pageSize?: number;
  modifiedSince?: string;
  signal?: AbortSignal;
  /** Called after each page has been appended */
  onPage?: (progress: PageProgress) => void;
}

export interface PageProgress {
  page: number;
  offset: number;
  fetched: number;
  total: number;
}

export interface ApiClientOptions extends HttpClientOptions {
  /** Clock used for request timestamps, epoch milliseconds */
  now?: () => number;
}

/**
 * Catalog API client class
 */
export class ApiClient {
  private httpClient: HttpClient;
  private now: () => number;

  /**
   * @param config API settings
   * @param credentials API keys
   */
  constructor(
    private config: ApiConfig,
    private credentials: Credentials,
    options: ApiClientOptions = {}
  ) {
    const { now, ...httpOptions } = options;
    this.httpClient = new HttpClient(config, httpOptions);
    this.now = now ?? Date.now;
  }

  /**
   * Fetches one page of characters
   * @param offset records to skip
   * @param pageSize records to return (`limit`)
   * @param modifiedSince optional date filter
   */
  async fetchCharacterPage(
    offset: number,
    pageSize: number = this.config.page_size,
    modifiedSince?: string,
    signal?: AbortSignal
  ): Promise<CharacterPage> {
    const { timestamp, digest } = createRequestSignature(this.credentials, this.now);

    const params: QueryParams = {
      apikey: this.credentials.publicKey,
      hash: digest,
      limit: String(pageSize),
      ts: timestamp,
      offset: String(offset)
    };
    if (modifiedSince) {
      params.modifiedSince = modifiedSince;
    }

    const body = await this.httpClient.get(this.config.endpoint, params, signal);
    return parseCharacterPage(body);
  }

  /**
   * Fetches every page of characters
   *
   * `total` is taken from the first response. A catalog that changes size
   * mid-walk is not reconciled.
   * @returns raw records in server order
   */
  async fetchWithPagination(params: FetchPageParams = {}): Promise<RawRecord[]> {
    const { modifiedSince, signal, onPage } = params;
    const pageSize = params.pageSize ?? this.config.page_size;
    if (!Number.isInteger(pageSize) || pageSize <= 0) {
      throw new RangeError(`Page size must be a positive integer, got ${pageSize}`);
    }

    const records: RawRecord[] = [];
    let offset = 0;
    let total = 0;
    let page = 0;

    do {
      const current = await this.fetchCharacterPage(offset, pageSize, modifiedSince, signal);
      page++;

      if (page === 1) {
        total = current.total;
        console.log(`Catalog reports ${total} characters (page size: ${pageSize})`);
      } else if (current.total !== total) {
        console.warn(`Catalog total changed from ${total} to ${current.total} during the walk; keeping ${total}`);
      }

      records.push(...current.records);
      offset += pageSize;

      console.log(`Extracted ${records.length} of ${total} total.`);
      onPage?.({ page, offset: current.offset, fetched: records.length, total });
    } while (offset < total);

    return records;
  }
}

/**
 * Validates the `{data: {offset, total, count, results}}` envelope
 * @throws MalformedResponseError
 */
export function parseCharacterPage(body: unknown): CharacterPage {
  if (!isRecord(body) || !isRecord(body.data)) {
    throw new MalformedResponseError('Response has no data envelope', body);
  }

  const { offset, total, count, results } = body.data;
  if (!isNonNegativeInteger(offset) || !isNonNegativeInteger(total)) {
    throw new MalformedResponseError('Response envelope lacks numeric offset/total', body);
  }
  if (!Array.isArray(results) || !results.every(isRecord)) {
    throw new MalformedResponseError('Response envelope lacks a results array', body);
  }

  return {
    offset,
    total,
    count: isNonNegativeInteger(count) ? count : results.length,
    records: results
  };
}
