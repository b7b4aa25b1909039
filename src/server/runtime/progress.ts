import { McpNotification } from '../../types/enums.js';
import type { JsonRpcParams } from '../../types/jsonrpc.js';
import type { Logger } from '../../utils/logger.js';
import { notification } from '../protocol/messages.js';
import { describeValue } from '../utils/errorConverter.js';

export type ProgressToken = string | number;

/**
 * Where progress notifications go; the transport in production
 */
export interface ProgressSender {
  send(message: object): Promise<void>;
  readonly isClosed: boolean;
}

/**
 * Peer opt-in for progress: `params._meta.progressToken`
 */
export function readProgressToken(
  params: JsonRpcParams | undefined
): ProgressToken | undefined {
  if (params === undefined || Array.isArray(params)) {
    return undefined;
  }
  const meta = params._meta;
  if (typeof meta !== 'object' || meta === null || !('progressToken' in meta)) {
    return undefined;
  }
  const token = meta.progressToken;
  return typeof token === 'string' || typeof token === 'number'
    ? token
    : undefined;
}

export class ProgressNotifier {
  private closed = false;

  constructor(
    private readonly progressToken: ProgressToken | undefined,
    private readonly sender: ProgressSender | undefined,
    private readonly logger?: Logger
  ) {}

  /** A notifier that never sends; for direct registry calls */
  static disabled(): ProgressNotifier {
    return new ProgressNotifier(undefined, undefined);
  }

  get enabled(): boolean {
    return (
      !this.closed &&
      this.progressToken !== undefined &&
      this.sender !== undefined &&
      !this.sender.isClosed
    );
  }

  /**
   * Stop sending. Called once the call has its response, so a handler still
   * running after a timeout cannot report progress behind it.
   */
  close(): void {
    this.closed = true;
  }

  /**
   * Report progress. `percent` is clamped to 0..100 and sent against a total
   * of 100; a missing or non-finite `percent` sends only the message.
   */
  async notify(message: string, percent?: number): Promise<void> {
    if (
      this.closed ||
      this.progressToken === undefined ||
      !this.sender ||
      this.sender.isClosed
    ) {
      return;
    }

    const scaled =
      percent !== undefined && Number.isFinite(percent)
        ? Math.min(100, Math.max(0, percent))
        : undefined;
    const params: Record<string, unknown> = {
      progressToken: this.progressToken,
      progress: scaled ?? 0,
      message,
    };
    if (scaled !== undefined) {
      params.total = 100;
    }

    try {
      await this.sender.send(notification(McpNotification.Progress, params));
    } catch (error) {
      this.logger?.warn('Failed to send progress notification', {
        progressToken: this.progressToken,
        error: error instanceof Error ? error.message : describeValue(error),
      });
    }
  }
}
