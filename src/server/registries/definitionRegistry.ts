import { InternalServerError, type McpServerError } from '../../types/index.js';
import type { DefinitionKind } from '../../types/enums.js';
import type {
  DefinitionBase,
  DefinitionSummary,
  HandlerParams,
} from '../../types/handlers.js';
import { CancellationToken } from '../runtime/cancellation.js';
import { ProgressNotifier } from '../runtime/progress.js';

/**
 * Name-keyed lookup table shared by tools, resources and prompts. Performs no
 * admission control; the call pipeline layers that on top.
 */
export abstract class DefinitionRegistry<TDef extends DefinitionBase> {
  protected readonly definitions = new Map<string, TDef>();
  private frozen = false;

  abstract readonly kind: DefinitionKind;

  /** Lookup key of a definition (name, or uri for resources) */
  protected abstract keyOf(definition: TDef): string;

  protected abstract notFound(key: string): McpServerError;

  protected abstract describe(definition: TDef): Record<string, unknown>;

  /** Last registration under a key wins */
  register(definition: TDef): void {
    const key = this.keyOf(definition);
    if (this.frozen) {
      throw new InternalServerError(
        `Cannot register ${this.kind} ${key} after the server has started`
      );
    }
    this.definitions.set(key, definition);
  }

  get(key: string): TDef | undefined {
    return this.definitions.get(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  /** Like `get`, but raises the kind's not-found error */
  resolve(key: string): TDef {
    const definition = this.get(key);
    if (!definition) {
      throw this.notFound(key);
    }
    return definition;
  }

  get size(): number {
    return this.definitions.size;
  }

  values(): TDef[] {
    return [...this.definitions.values()];
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  list(): DefinitionSummary[] {
    return this.values().map((definition) => ({
      ...summarizeFlags(definition),
      ...this.describe(definition),
    }));
  }

  /**
   * Invoke a handler directly, without validation or limits
   */
  async call(
    key: string,
    params: HandlerParams,
    cancelToken?: CancellationToken,
    progress?: ProgressNotifier
  ): Promise<unknown> {
    const definition = this.resolve(key);
    return definition.handler(
      params,
      cancelToken ?? new CancellationToken(),
      progress ?? ProgressNotifier.disabled()
    );
  }
}

/**
 * Common listing fields; false or absent flags are left out
 */
function summarizeFlags(definition: DefinitionBase): DefinitionSummary {
  const summary: DefinitionSummary = { name: definition.name };
  if (definition.description) {
    summary.description = definition.description;
  }
  if (definition.readOnly) {
    summary.readOnly = true;
  }
  if (definition.writesToDisk) {
    summary.writesToDisk = true;
  }
  if (definition.requiresConfirmation) {
    summary.requiresConfirmation = true;
  }
  if (definition.idempotent) {
    summary.idempotent = true;
  }
  return summary;
}

/**
 * Human-readable labels for the set flags, for prompts and CLI listings
 */
export function flagLabels(definition: DefinitionBase): string[] {
  const labels: string[] = [];
  if (definition.readOnly) labels.push('read-only');
  if (definition.writesToDisk) labels.push('writes to disk');
  if (definition.requiresConfirmation) labels.push('requires confirmation');
  if (definition.idempotent) labels.push('idempotent');
  return labels;
}
