import { createHash } from 'node:crypto';
import { trimText } from './text.js';

const SEPARATOR = '|';

/**
 * Content-addressed review id: SHA-1 hex of `appId|text|civilTimestamp`.
 * The composition must not change or rows already in the store stop matching.
 */
export function fingerprint(appId: string, text: string, civilTimestamp: string): string {
  const raw = [appId, trimText(text), civilTimestamp].join(SEPARATOR);
  return createHash('sha1').update(raw, 'utf8').digest('hex');
}
