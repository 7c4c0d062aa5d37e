/**
 * RFC 1939 Response Framing Unit Tests
 *
 * Tests status line parsing (section 3) and multi-line reply termination
 * and byte-stuffing, including the edge cases around lines made of dots.
 */

import { describe, it, expect } from 'vitest';
import {
  parseShort,
  readShort,
  parseLong,
  isTerminator,
  unstuffLine,
  stuffLine
} from '../../src/protocol/parser.js';
import {
  Pop3ConnectionError,
  Pop3ProtocolError,
  Pop3ServerError
} from '../../src/types/errors.js';
import { sourceOf } from '../helpers/mock-channel.js';

describe('RFC 1939 Response Framing', () => {
  describe('Status lines', () => {
    it('should parse +OK with text', () => {
      const response = parseShort('+OK POP3 server ready');
      expect(response.status).toBe('POP3 server ready');
      expect(response.body).toEqual([]);
    });

    it('should parse bare +OK as empty status', () => {
      expect(parseShort('+OK').status).toBe('');
    });

    it('should trim surrounding whitespace from the status', () => {
      expect(parseShort('+OK   2 320  ').status).toBe('2 320');
    });

    it('should freeze the response', () => {
      const response = parseShort('+OK');
      expect(Object.isFrozen(response)).toBe(true);
      expect(Object.isFrozen(response.body)).toBe(true);
    });

    it('should throw a server error for -ERR', () => {
      expect(() => parseShort('-ERR no such message', 'RETR')).toThrow(Pop3ServerError);

      try {
        parseShort('-ERR  no such message ', 'RETR');
      } catch (err) {
        expect(err).toBeInstanceOf(Pop3ServerError);
        if (err instanceof Pop3ServerError) {
          expect(err.message).toBe('no such message');
          expect(err.serverResponse).toBe('-ERR  no such message ');
          expect(err.command).toBe('RETR');
          expect(err.source).toBe('server');
        }
      }
    });

    it('should throw a protocol error for an empty line', () => {
      expect(() => parseShort('')).toThrow(Pop3ProtocolError);
      expect(() => parseShort('')).toThrow('Empty status line');
    });

    it('should throw a protocol error for a line without a marker', () => {
      expect(() => parseShort('OK fine')).toThrow('Unrecognised status line: OK fine');
    });

    it('should be case sensitive about markers', () => {
      expect(() => parseShort('+ok')).toThrow(Pop3ProtocolError);
    });
  });

  describe('readShort', () => {
    it('should read exactly one line', async () => {
      const source = sourceOf('+OK first\r\n+OK second\r\n');

      await expect(readShort(source)).resolves.toEqual({ status: 'first', body: [] });
      await expect(readShort(source)).resolves.toEqual({ status: 'second', body: [] });
    });

    it('should report end of stream as a connection error', async () => {
      await expect(readShort(sourceOf(''), 'NOOP')).rejects.toBeInstanceOf(Pop3ConnectionError);
    });
  });

  describe('Multi-line replies', () => {
    it('should collect body lines until the terminator', async () => {
      const response = await parseLong(sourceOf('+OK 2 messages\r\n1 500\r\n2 300\r\n.\r\n'));

      expect(response.status).toBe('2 messages');
      expect(response.body).toEqual(['1 500', '2 300']);
    });

    it('should return an empty body for an immediate terminator', async () => {
      const response = await parseLong(sourceOf('+OK\r\n.\r\n'));
      expect(response.body).toEqual([]);
    });

    it('should strip one dot from stuffed lines', async () => {
      const response = await parseLong(sourceOf('+OK\r\n..\r\n...\r\n..hidden\r\n.\r\n'));
      expect(response.body).toEqual(['.', '..', '.hidden']);
    });

    it('should keep a single leading dot followed by text', async () => {
      // Not stuffed by a well-behaved server, but not a terminator either
      const response = await parseLong(sourceOf('+OK\r\n.x\r\n.\r\n'));
      expect(response.body).toEqual(['.x']);
    });

    it('should not treat a dot with trailing space as the terminator', async () => {
      const response = await parseLong(sourceOf('+OK\r\n. \r\n.\r\n'));
      expect(response.body).toEqual(['. ']);
    });

    it('should keep blank lines inside the body', async () => {
      const response = await parseLong(sourceOf('+OK\r\nSubject: x\r\n\r\nbody\r\n.\r\n'));
      expect(response.body).toEqual(['Subject: x', '', 'body']);
    });

    it('should leave lines after the terminator unread', async () => {
      const source = sourceOf('+OK\r\na\r\n.\r\n+OK next\r\n');

      await parseLong(source);

      await expect(readShort(source)).resolves.toEqual({ status: 'next', body: [] });
    });

    it('should throw a server error without reading a body after -ERR', async () => {
      const source = sourceOf('-ERR no such message\r\n+OK after\r\n');

      await expect(parseLong(source, 'RETR')).rejects.toBeInstanceOf(Pop3ServerError);
      await expect(readShort(source)).resolves.toEqual({ status: 'after', body: [] });
    });

    it('should throw a protocol error when the stream ends before the terminator', async () => {
      const error = await parseLong(sourceOf('+OK\r\none\r\ntwo\r\n'), 'RETR').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(Pop3ProtocolError);
      if (error instanceof Pop3ProtocolError) {
        expect(error.message).toBe('unexpected end of stream');
        expect(error.rawData).toBe('one\r\ntwo');
        expect(error.command).toBe('RETR');
      }
    });

    it('should not accept an unterminated dot as the end of the reply', async () => {
      await expect(parseLong(sourceOf('+OK\r\nline\r\n.'), 'RETR')).rejects.toMatchObject({
        message: 'unexpected end of stream',
        rawData: 'line',
        source: 'protocol'
      });
    });

    it('should treat an unterminated status line as end of stream', async () => {
      await expect(readShort(sourceOf('+OK'), 'NOOP')).rejects.toBeInstanceOf(Pop3ConnectionError);
    });

    it('should accept bare LF line endings', async () => {
      const response = await parseLong(sourceOf('+OK\nline\n.\n'));
      expect(response.body).toEqual(['line']);
    });
  });

  describe('Line helpers', () => {
    it('should recognise only a lone dot as terminator', () => {
      expect(isTerminator('.')).toBe(true);
      expect(isTerminator('..')).toBe(false);
      expect(isTerminator('')).toBe(false);
      expect(isTerminator('. ')).toBe(false);
    });

    it('should unstuff and stuff leading dots', () => {
      expect(unstuffLine('..')).toBe('.');
      expect(unstuffLine('.a')).toBe('.a');
      expect(unstuffLine('a.')).toBe('a.');
      expect(stuffLine('.')).toBe('..');
      expect(stuffLine('a')).toBe('a');
    });
  });
});
