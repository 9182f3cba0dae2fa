/**
 * Function Fingerprint
 */

import crypto from 'crypto';

/**
 * Short md5 of the source text with all whitespace removed, so re-indented
 * copies of a function share a fingerprint.
 */
export function fingerprintSource(text: string): string {
  return crypto.createHash('md5').update(text.replace(/\s+/g, '')).digest('hex').slice(0, 8);
}
