/**
 * Property-based tests for POP3 reply parsing
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  parseShort,
  parseLong,
  stuffLine,
  unstuffLine,
  ResponseParser
} from '../../src/protocol/index.js';
import { Pop3ProtocolError, Pop3ServerError } from '../../src/types/errors.js';
import { sourceOf } from '../helpers/mock-channel.js';

/**
 * Body lines, biased towards the dot cases the stuffing rules care about
 */
const bodyLineArb = fc.oneof(
  fc.string({ maxLength: 40 }),
  fc.constantFrom('.', '..', '...', '.x', '')
);

const statusTextArb = fc.stringOf(
  fc.constantFrom(...'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789 .,!?-_<>@'),
  { minLength: 0, maxLength: 50 }
);

/**
 * Renders a multi-line reply the way a server puts it on the wire
 */
function wire(status: string, lines: string[], terminated = true): string {
  const body = lines.map(line => `${stuffLine(line)}\r\n`).join('');
  return `+OK ${status}\r\n${body}${terminated ? '.\r\n' : ''}`;
}

describe('Reply Parsing Properties', () => {
  it('should return the trimmed text of any +OK line', () => {
    fc.assert(
      fc.property(statusTextArb, (text) => {
        const response = parseShort(`+OK ${text}`);
        expect(response.status).toBe(text.trim());
        expect(response.body).toEqual([]);
      }),
      { numRuns: 100 }
    );
  });

  it('should raise a server error carrying the text of any -ERR line', () => {
    fc.assert(
      fc.property(statusTextArb, (text) => {
        const line = `-ERR ${text}`;
        try {
          parseShort(line, 'DELE');
          expect.unreachable();
        } catch (err) {
          expect(err).toBeInstanceOf(Pop3ServerError);
          expect(err).toMatchObject({ message: text.trim(), serverResponse: line, command: 'DELE' });
        }
      }),
      { numRuns: 100 }
    );
  });

  it('should reject any line without a status marker', () => {
    fc.assert(
      fc.property(
        statusTextArb.filter(text => !text.startsWith('+OK') && !text.startsWith('-ERR')),
        (text) => {
          expect(() => parseShort(text)).toThrow(Pop3ProtocolError);
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should recover the unstuffed body lines from a stuffed reply', async () => {
    await fc.assert(
      fc.asyncProperty(statusTextArb, fc.array(bodyLineArb, { maxLength: 20 }), async (status, lines) => {
        const response = await parseLong(sourceOf(wire(status, lines)), 'RETR');

        expect(response.status).toBe(status.trim());
        expect(response.body).toEqual(lines);
      }),
      { numRuns: 100 }
    );
  });

  it('should fail on any reply that ends before its terminator', async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(bodyLineArb, { maxLength: 20 }), async (lines) => {
        await expect(parseLong(sourceOf(wire('', lines, false)), 'RETR')).rejects.toMatchObject({
          message: 'unexpected end of stream',
          rawData: lines.join('\r\n'),
          source: 'protocol'
        });
      }),
      { numRuns: 100 }
    );
  });

  it('should make stuffing and unstuffing inverse for any line', () => {
    fc.assert(
      fc.property(bodyLineArb, (line) => {
        expect(unstuffLine(stuffLine(line))).toBe(line);
        expect(stuffLine(line) === '.').toBe(false);
      }),
      { numRuns: 200 }
    );
  });

  it('should parse any pair of counts in a STAT reply', () => {
    fc.assert(
      fc.property(fc.nat(), fc.nat(), (count, size) => {
        expect(ResponseParser.parseStat(`${count} ${size}`)).toEqual({ count, size });
      }),
      { numRuns: 100 }
    );
  });
});
