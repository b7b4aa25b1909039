import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Readable } from 'stream';
import {
  FrameDecoder,
  MAX_HEADER_BYTES,
  decodeFrames,
  encodeFrame,
  parseContentLength,
} from './frameCodec.js';
import { createSilentLogger, type Logger } from '../../utils/logger.js';

describe('frameCodec', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = createSilentLogger();
  });

  describe('encodeFrame', () => {
    it('should prefix the body with its byte length', () => {
      expect(encodeFrame('{"a":1}').toString('utf8')).toBe(
        'Content-Length: 7\r\n\r\n{"a":1}'
      );
    });

    it('should count UTF-8 bytes rather than characters', () => {
      expect(encodeFrame('héllo').toString('utf8')).toBe(
        'Content-Length: 6\r\n\r\nhéllo'
      );
    });
  });

  describe('parseContentLength', () => {
    it('should read the header case-insensitively', () => {
      expect(parseContentLength('content-length: 12')).toBe(12);
      expect(parseContentLength('CONTENT-LENGTH:3')).toBe(3);
    });

    it('should find the header among others', () => {
      expect(
        parseContentLength(
          'Content-Type: application/vscode-jsonrpc\r\nContent-Length: 42'
        )
      ).toBe(42);
    });

    it('should reject missing and non-numeric values', () => {
      expect(parseContentLength('Content-Type: text/plain')).toBeUndefined();
      expect(parseContentLength('Content-Length: abc')).toBeUndefined();
      expect(parseContentLength('Content-Length: -5')).toBeUndefined();
      expect(parseContentLength('Content-Length: 1e3')).toBeUndefined();
    });
  });

  describe('FrameDecoder', () => {
    const bodies = [
      '',
      '{"jsonrpc":"2.0","id":1,"method":"ping"}',
      '{"text":"line1\\r\\nline2"}\r\n\r\nraw CRLF\r\n',
      '{"text":"emoji 🚀 and 日本語 and ü"}',
    ];

    it.each(bodies)('should round-trip body %j', (body) => {
      const decoder = new FrameDecoder({ maxMessageBytes: 1024, logger });
      expect(decoder.push(encodeFrame(body))).toEqual([body]);
      expect(decoder.bufferedBytes).toBe(0);
    });

    it.each([
      '{}',
      '{"jsonrpc":"2.0","method":"notifications/initialized"}',
      `{"payload":"${'x'.repeat(300)}","unicode":"ñ€😀"}`,
    ])('should decode %j split at every byte boundary', (body) => {
      const frame = encodeFrame(body);
      for (let split = 0; split <= frame.length; split++) {
        const decoder = new FrameDecoder({ maxMessageBytes: 4096, logger });
        const out = [
          ...decoder.push(frame.subarray(0, split)),
          ...decoder.push(frame.subarray(split)),
        ];
        expect(out).toEqual([body]);
      }
    });

    it('should decode a frame fed one byte at a time', () => {
      const body = '{"id":"ä","method":"tools/list"}';
      const frame = encodeFrame(body);
      const decoder = new FrameDecoder({ maxMessageBytes: 1024, logger });
      const out: string[] = [];
      for (let i = 0; i < frame.length; i++) {
        out.push(...decoder.push(frame.subarray(i, i + 1)));
      }
      expect(out).toEqual([body]);
    });

    it('should emit every complete frame of a chunk', () => {
      const decoder = new FrameDecoder({ maxMessageBytes: 1024, logger });
      const chunk = Buffer.concat([
        encodeFrame('{"n":1}'),
        encodeFrame('{"n":2}'),
        encodeFrame('{"n":3}'),
        Buffer.from('Content-Length: 7\r\n\r\n{"n"'),
      ]);

      expect(decoder.push(chunk)).toEqual(['{"n":1}', '{"n":2}', '{"n":3}']);
      expect(decoder.push(Buffer.from(':4}'))).toEqual(['{"n":4}']);
    });

    it('should accept extra headers', () => {
      const decoder = new FrameDecoder({ maxMessageBytes: 1024, logger });
      const chunk = Buffer.from(
        'content-length: 2\r\nContent-Type: application/json\r\n\r\n{}'
      );
      expect(decoder.push(chunk)).toEqual(['{}']);
    });

    it('should skip a header without Content-Length and keep going', () => {
      const warn = vi.spyOn(logger, 'warn');
      const decoder = new FrameDecoder({ maxMessageBytes: 1024, logger });
      const chunk = Buffer.concat([
        Buffer.from('X-Other: 1\r\n\r\n'),
        Buffer.from('Content-Length: abc\r\n\r\n'),
        encodeFrame('{"ok":true}'),
      ]);

      expect(decoder.push(chunk)).toEqual(['{"ok":true}']);
      expect(warn).toHaveBeenCalledTimes(2);
      expect(warn.mock.calls[0]?.[0]).toBe(
        'Dropping frame with missing or invalid Content-Length'
      );
    });

    it('should drop an oversized frame and decode the next one', () => {
      const warn = vi.spyOn(logger, 'warn');
      const decoder = new FrameDecoder({ maxMessageBytes: 10, logger });
      const chunk = Buffer.concat([
        encodeFrame('{"big":"0123456789"}'),
        encodeFrame('{"a":1}'),
      ]);

      expect(decoder.push(chunk)).toEqual(['{"a":1}']);
      expect(warn).toHaveBeenCalledWith('Dropping oversized frame', {
        contentLength: 20,
        maxMessageBytes: 10,
      });
    });

    it('should keep discarding an oversized body across chunks', () => {
      const decoder = new FrameDecoder({ maxMessageBytes: 10, logger });
      const oversized = encodeFrame(`{"big":"${'z'.repeat(40)}"}`);
      const valid = encodeFrame('{"b":2}');

      expect(decoder.push(oversized.subarray(0, 30))).toEqual([]);
      expect(decoder.push(oversized.subarray(30, 40))).toEqual([]);
      expect(
        decoder.push(Buffer.concat([oversized.subarray(40), valid]))
      ).toEqual(['{"b":2}']);
      expect(decoder.bufferedBytes).toBe(0);
    });

    it('should not buffer an unterminated header without bound', () => {
      const warn = vi.spyOn(logger, 'warn');
      const decoder = new FrameDecoder({ maxMessageBytes: 1024, logger });

      expect(decoder.push(Buffer.alloc(MAX_HEADER_BYTES + 100, 'x'))).toEqual([]);
      expect(decoder.bufferedBytes).toBe(3);
      expect(warn).toHaveBeenCalledWith('Dropping unterminated header block', {
        bytes: MAX_HEADER_BYTES + 100,
      });
    });
  });

  describe('decodeFrames', () => {
    it('should yield frames from a stream and end with it', async () => {
      const bytes = Buffer.concat([encodeFrame('{"a":1}'), encodeFrame('{"b":2}')]);
      const stream = Readable.from([bytes.subarray(0, 5), bytes.subarray(5)]);

      const out: string[] = [];
      for await (const frame of decodeFrames(stream, {
        maxMessageBytes: 1024,
        logger,
      })) {
        out.push(frame);
      }

      expect(out).toEqual(['{"a":1}', '{"b":2}']);
    });

    it('should drop a trailing partial frame at end of input', async () => {
      const debug = vi.spyOn(logger, 'debug');
      const stream = Readable.from([
        encodeFrame('{"a":1}'),
        Buffer.from('Content-Length: 50\r\n\r\n{"par'),
      ]);

      const out: string[] = [];
      for await (const frame of decodeFrames(stream, {
        maxMessageBytes: 1024,
        logger,
      })) {
        out.push(frame);
      }

      expect(out).toEqual(['{"a":1}']);
      expect(debug).toHaveBeenCalledWith(
        'Input ended inside a frame, dropping partial data',
        { bytes: 27 }
      );
    });
  });
});
