/**
 * Request signing
 *
 * Every call carries `ts`, `apikey` and `hash = md5(ts + privateKey + publicKey)`.
 * The concatenation order is fixed by the API; any other order is rejected
 * as unauthenticated.
 */
import { createHash } from 'crypto';
import { Credentials } from '../types/config';
import { RequestSignature } from '../types/data';
import { currentTimestamp } from '../utils/time-utils';

/**
 * @param timestamp value sent as `ts`
 * @returns lowercase hex digest sent as `hash`
 */
export function sign(timestamp: string, publicKey: string, privateKey: string): string {
  return createHash('md5')
    .update(timestamp + privateKey + publicKey, 'utf8')
    .digest('hex');
}

/**
 * Signs a new request with a fresh timestamp
 * @param now clock in epoch milliseconds
 */
export function createRequestSignature(
  credentials: Credentials,
  now: () => number = Date.now
): RequestSignature {
  const timestamp = currentTimestamp(now);
  return {
    timestamp,
    digest: sign(timestamp, credentials.publicKey, credentials.privateKey)
  };
}
