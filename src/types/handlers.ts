/**
 * Shared types for tool, resource and prompt definitions
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type { CancellationToken } from '../server/runtime/cancellation.js';
import type { ProgressNotifier } from '../server/runtime/progress.js';

export type HandlerParams = Record<string, unknown>;

/**
 * Any zod schema whose parsed output is `T`, regardless of its input shape
 * (defaults and transforms make the two differ)
 */
export type OutputSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export interface DefinitionBase<
  TParams extends HandlerParams = HandlerParams,
  TResult = unknown,
> {
  readonly name: string;
  readonly description?: string;
  readonly paramsSchema?: OutputSchema<TParams>;
  readonly resultSchema?: OutputSchema<TResult>;
  readonly readOnly?: boolean;
  readonly writesToDisk?: boolean;
  readonly requiresConfirmation?: boolean;
  readonly idempotent?: boolean;
  readonly timeoutMs?: number;
  readonly maxConcurrency?: number;
  /**
   * Invoked once a call has been admitted. The token is cancelled on peer
   * cancellation, timeout and shutdown; handlers check it at their own
   * suspension points.
   */
  handler(
    params: TParams,
    cancelToken: CancellationToken,
    progress: ProgressNotifier
  ): TResult | Promise<TResult>;
}

export type ToolDefinition<
  TParams extends HandlerParams = HandlerParams,
  TResult = unknown,
> = DefinitionBase<TParams, TResult>;

/**
 * A resource is addressed by `uri`. A uri ending in `/` serves every uri
 * beneath it; the handler receives the requested uri in `params.uri`.
 */
export interface ResourceDefinition<
  TParams extends HandlerParams = HandlerParams,
  TResult = unknown,
> extends DefinitionBase<TParams, TResult> {
  readonly uri: string;
  readonly mimeType?: string;
}

export interface PromptMessage {
  role: 'user' | 'assistant';
  content: { type: 'text'; text: string };
}

export interface PromptResult {
  description?: string;
  messages: PromptMessage[];
}

/**
 * Prompt handlers receive the `arguments` object of `prompts/get`
 */
export type PromptDefinition<TParams extends HandlerParams = HandlerParams> =
  DefinitionBase<TParams, PromptResult>;

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallResult {
  content: TextContent[];
  structuredContent?: Record<string, unknown>;
}

export interface ResourceReadResult {
  contents: { uri: string; mimeType: string; text: string }[];
}

/**
 * Wire listing entry shared by every kind of definition
 */
export interface DefinitionSummary {
  name: string;
  description?: string;
  readOnly?: true;
  writesToDisk?: true;
  requiresConfirmation?: true;
  idempotent?: true;
  [key: string]: unknown;
}
