import type { Readable, Writable } from 'stream';
import type { Logger } from '../../utils/logger.js';
import { decodeFrames, encodeFrame } from './frameCodec.js';

export interface StdioTransportOptions {
  input: Readable;
  output: Writable;
  maxMessageBytes: number;
  logger: Logger;
}

/**
 * Writes one frame per `write()` call so frames from concurrent senders never
 * interleave. Resolves once the stream has accepted the frame.
 */
export class FrameWriter {
  constructor(private readonly output: Writable) {}

  write(body: string): Promise<void> {
    const frame = encodeFrame(body);
    return new Promise<void>((resolve, reject) => {
      if (this.output.destroyed || this.output.writableEnded) {
        reject(new Error('Output stream is closed'));
        return;
      }
      this.output.write(frame, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}

/**
 * Framed JSON-RPC over a pair of byte streams (stdin/stdout in production)
 */
export class StdioTransport {
  private readonly writer: FrameWriter;
  private readonly logger: Logger;
  private closed = false;

  constructor(private readonly options: StdioTransportOptions) {
    this.logger = options.logger;
    this.writer = new FrameWriter(options.output);

    // A peer that goes away mid-write surfaces as EPIPE here
    options.output.on('error', (error) => {
      this.logger.warn('Output stream error', { error: error.message });
    });
  }

  /**
   * Frame bodies in arrival order; ends when the input ends
   */
  frames(): AsyncGenerator<string, void, undefined> {
    return decodeFrames(this.options.input, {
      maxMessageBytes: this.options.maxMessageBytes,
      logger: this.logger,
    });
  }

  async send(message: object): Promise<void> {
    if (this.closed) {
      throw new Error('Transport is closed');
    }
    await this.writer.write(JSON.stringify(message));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }
}
