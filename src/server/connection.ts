import { InvalidRequestError } from '../types/index.js';
import type {
  JsonRpcRequest,
  JsonRpcResponse,
  ParseFailure,
} from '../types/jsonrpc.js';
import type { Logger } from '../utils/logger.js';
import type { Dispatcher } from './dispatcher.js';
import { errorResponse, parseMessage } from './protocol/messages.js';
import type { CancellationRegistry } from './runtime/cancellation.js';
import type { StdioTransport } from './transport/stdioTransport.js';
import { describeValue, toWireError } from './utils/errorConverter.js';

export interface JsonRpcConnectionOptions {
  transport: StdioTransport;
  dispatcher: Dispatcher;
  cancellations: CancellationRegistry;
  logger: Logger;
}

/**
 * One peer session. Frames are read one at a time; each request runs as its
 * own task so a slow call never blocks the reader, and responses go out in
 * completion order. Notifications are handled inline, in receipt order.
 */
export class JsonRpcConnection {
  private readonly tasks = new Set<Promise<void>>();
  private readonly logger: Logger;
  private closing = false;

  constructor(private readonly options: JsonRpcConnectionOptions) {
    this.logger = options.logger;
  }

  /**
   * Resolves after the input has ended, every in-flight call has been
   * cancelled and their responses have been written
   */
  async run(): Promise<void> {
    for await (const body of this.options.transport.frames()) {
      if (this.closing) {
        this.logger.debug('Connection closing, ignoring frame');
        continue;
      }
      this.handleFrame(body);
    }

    this.logger.info('Input closed');
    await this.close();
  }

  /** Cancel everything in flight and wait for the resulting responses */
  async close(): Promise<void> {
    this.closing = true;
    const cancelled = this.options.cancellations.cancelAll();
    if (cancelled > 0) {
      this.logger.info('Cancelled in-flight calls', { cancelled });
    }
    await Promise.allSettled([...this.tasks]);
    this.options.transport.close();
  }

  private handleFrame(body: string): void {
    const parsed = parseMessage(body);
    switch (parsed.kind) {
      case 'request':
        this.track(parsed.message);
        return;
      case 'notification':
        this.options.dispatcher.handleNotification(parsed.message);
        return;
      case 'response':
        this.logger.debug('Ignoring response from peer', { id: parsed.message.id });
        return;
      case 'invalid':
        this.handleInvalid(parsed.failure);
        return;
    }
  }

  /**
   * Only an envelope with a usable id can be answered; anything else is
   * dropped
   */
  private handleInvalid(failure: ParseFailure): void {
    if (failure.reason === 'invalid-request' && failure.id !== undefined) {
      this.logger.warn('Rejecting invalid request', {
        id: failure.id,
        reason: failure.message,
      });
      const task = this.send(
        errorResponse(failure.id, toWireError(new InvalidRequestError(failure.message)))
      ).finally(() => {
        this.tasks.delete(task);
      });
      this.tasks.add(task);
      return;
    }
    this.logger.debug('Discarding unusable message', {
      reason: failure.reason,
      message: failure.message,
    });
  }

  private track(request: JsonRpcRequest): void {
    const task = this.respond(request).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  private async respond(request: JsonRpcRequest): Promise<void> {
    let response: JsonRpcResponse;
    try {
      response = await this.options.dispatcher.handleRequest(request);
    } catch (error) {
      this.logger.error('Dispatcher failed to produce a response', {
        id: request.id,
        error: describeValue(error),
      });
      response = errorResponse(request.id, toWireError(error, request.id));
    }
    await this.send(response);
  }

  private async send(response: JsonRpcResponse): Promise<void> {
    try {
      await this.options.transport.send(response);
    } catch (error) {
      this.logger.warn('Failed to write response', {
        id: response.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
