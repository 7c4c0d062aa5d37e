/**
 * APOP digest (RFC 1939 section 7)
 */

import { createHash } from 'crypto';

/**
 * MD5 of the banner timestamp followed by the shared secret, as lowercase hex
 *
 * @param timestamp - Timestamp from the greeting, angle brackets included
 * @param secret - Secret shared with the server
 */
export function apopDigest(timestamp: string, secret: string): string {
  return createHash('md5').update(timestamp + secret, 'utf8').digest('hex');
}
