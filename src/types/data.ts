/**
 * Upstream record, page and shaped row types
 */

/**
 * Nested count-plus-links structure attached to every character
 * (comics, series, stories, events). Only `available` survives shaping.
 */
export interface CounterGroup {
  available: number;
  collectionURI?: string;
  items?: Array<{ resourceURI: string; name: string; type?: string }>;
  returned?: number;
}

/**
 * A character exactly as the API returns it.
 * Left untyped beyond an object so that the shaper validates every field it reads.
 */
export type RawRecord = Record<string, unknown>;

export interface CharacterRow {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly comics: number;
  readonly series: number;
  readonly stories: number;
  readonly events: number;
}

export type Dataset = ReadonlyArray<CharacterRow>;

/**
 * Cursor state and records of one page
 */
export interface CharacterPage {
  offset: number;
  total: number;
  count: number;
  records: RawRecord[];
}

export interface RequestSignature {
  timestamp: string;
  digest: string;
}

/**
 * Response envelope of `GET {base}/characters`
 */
export interface CharacterDataWrapper {
  code?: number;
  status?: string;
  data: {
    offset: number;
    limit?: number;
    total: number;
    count: number;
    results: RawRecord[];
  };
}
