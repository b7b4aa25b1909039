/**
 * Content-Length framing for JSON-RPC over byte streams.
 *
 * A frame is a block of `Name: value` header lines, a blank line, then exactly
 * `Content-Length` bytes of UTF-8 body:
 *
 * ```
 * Content-Length: 17\r\n
 * \r\n
 * {"jsonrpc":"2.0"}
 * ```
 */

import type { Logger } from '../../utils/logger.js';

const HEADER_TERMINATOR = Buffer.from('\r\n\r\n', 'ascii');

/**
 * Longest header block accepted while waiting for a terminator. Beyond this
 * the pending bytes cannot be a valid header and are dropped.
 */
export const MAX_HEADER_BYTES = 8 * 1024;

export interface FrameDecoderOptions {
  maxMessageBytes: number;
  logger?: Logger;
}

export function encodeFrame(body: string): Buffer {
  const payload = Buffer.from(body, 'utf8');
  const header = Buffer.from(
    `Content-Length: ${payload.length}\r\n\r\n`,
    'ascii'
  );
  return Buffer.concat([header, payload]);
}

/**
 * Extract the declared body length from a header block, or undefined when
 * the header is absent or not a plain decimal number
 */
export function parseContentLength(headerText: string): number | undefined {
  for (const line of headerText.split('\r\n')) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }
    const name = line.slice(0, colon).trim().toLowerCase();
    if (name !== 'content-length') {
      continue;
    }
    const value = line.slice(colon + 1).trim();
    return /^\d+$/.test(value) ? Number(value) : undefined;
  }
  return undefined;
}

/**
 * Incremental decoder. Feed it chunks as they arrive; it returns every frame
 * body that became complete, in order.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  /** Body bytes of an oversized frame still to be skipped */
  private discardRemaining = 0;
  private readonly maxMessageBytes: number;
  private readonly logger: Logger | undefined;

  constructor(options: FrameDecoderOptions) {
    this.maxMessageBytes = options.maxMessageBytes;
    this.logger = options.logger;
  }

  /** Bytes held back waiting for the rest of a frame */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): string[] {
    const buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const frames: string[] = [];
    let offset = 0;

    if (this.discardRemaining > 0) {
      const skipped = Math.min(this.discardRemaining, buffer.length);
      this.discardRemaining -= skipped;
      offset = skipped;
    }

    while (this.discardRemaining === 0 && offset < buffer.length) {
      const headerEnd = buffer.indexOf(HEADER_TERMINATOR, offset);
      if (headerEnd === -1) {
        offset = this.trimUnterminatedHeader(buffer, offset);
        break;
      }

      const bodyStart = headerEnd + HEADER_TERMINATOR.length;
      const headerText = buffer.toString('utf8', offset, headerEnd);
      const contentLength = parseContentLength(headerText);

      if (contentLength === undefined) {
        this.logger?.warn('Dropping frame with missing or invalid Content-Length', {
          header: headerText.slice(0, 200),
        });
        offset = bodyStart;
        continue;
      }

      if (contentLength > this.maxMessageBytes) {
        this.logger?.warn('Dropping oversized frame', {
          contentLength,
          maxMessageBytes: this.maxMessageBytes,
        });
        const available = buffer.length - bodyStart;
        if (available >= contentLength) {
          offset = bodyStart + contentLength;
        } else {
          this.discardRemaining = contentLength - available;
          offset = buffer.length;
        }
        continue;
      }

      if (buffer.length - bodyStart < contentLength) {
        break;
      }

      frames.push(buffer.toString('utf8', bodyStart, bodyStart + contentLength));
      offset = bodyStart + contentLength;
    }

    this.buffer =
      offset >= buffer.length ? Buffer.alloc(0) : buffer.subarray(offset);
    return frames;
  }

  private trimUnterminatedHeader(buffer: Buffer, offset: number): number {
    const pending = buffer.length - offset;
    if (pending <= MAX_HEADER_BYTES) {
      return offset;
    }
    this.logger?.warn('Dropping unterminated header block', { bytes: pending });
    // Keep a possible partial terminator
    return buffer.length - (HEADER_TERMINATOR.length - 1);
  }
}

/**
 * Decode every frame of a readable stream. Ends when the stream ends; a
 * trailing partial frame is dropped.
 */
export async function* decodeFrames(
  stream: AsyncIterable<Buffer | string>,
  options: FrameDecoderOptions
): AsyncGenerator<string, void, undefined> {
  const decoder = new FrameDecoder(options);

  for await (const chunk of stream) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    for (const frame of decoder.push(bytes)) {
      yield frame;
    }
  }

  if (decoder.bufferedBytes > 0) {
    options.logger?.debug('Input ended inside a frame, dropping partial data', {
      bytes: decoder.bufferedBytes,
    });
  }
}
