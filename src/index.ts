/**
 * Main entry point of the fetcher module
 */
import { fetchCharacters, extractCharacters } from './fetcher';
import { ApiClient, parseCharacterPage } from './api-client';
import { HttpClient } from './io/http';
import { createRetryPolicy, exponentialBackoff } from './io/retry-policy';
import { sign, createRequestSignature } from './auth/signer';
import { shapeRecord, shapeRecords, CHARACTER_COLUMNS } from './shaper';
import { CsvFormatter } from './formatters/csv';
import { loadConfig, loadCredentials } from './config';

// extraction
export { fetchCharacters, extractCharacters };

// API access
export { ApiClient, parseCharacterPage, HttpClient, createRetryPolicy, exponentialBackoff };

// signing
export { sign, createRequestSignature };

// shaping
export { shapeRecord, shapeRecords, CHARACTER_COLUMNS };

// output
export { CsvFormatter };

// configuration
export { loadConfig, loadCredentials };

export * from './errors';
export * from './types/config';
export * from './types/data';
export * from './types/options';

export const VERSION = '0.1.0';
export const MODULE_NAME = 'character-catalog-fetcher';
