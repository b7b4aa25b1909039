import { ConcurrencyLimitError } from '../../types/index.js';

export interface ConcurrencyLimiterOptions {
  maxConcurrency: number;
  perToolLimits?: Record<string, number>;
}

export interface ConcurrencySnapshot {
  currentGlobal: number;
  maxGlobal: number;
  currentPerTool: Record<string, number>;
  perToolLimits: Record<string, number>;
}

/**
 * Admission control for calls: one global ceiling plus optional per-name
 * ceilings. Counters only move through matched `start`/`complete` pairs.
 */
export class ConcurrencyLimiter {
  private readonly maxGlobal: number;
  private readonly perToolLimits = new Map<string, number>();
  private readonly currentPerTool = new Map<string, number>();
  private currentGlobal = 0;

  constructor(options: ConcurrencyLimiterOptions) {
    this.maxGlobal = options.maxConcurrency;
    for (const [name, limit] of Object.entries(options.perToolLimits ?? {})) {
      this.perToolLimits.set(name, limit);
    }
  }

  /**
   * Limit declared by a definition; configured limits take precedence
   */
  setDefaultLimit(toolName: string, limit: number): void {
    if (!this.perToolLimits.has(toolName)) {
      this.perToolLimits.set(toolName, limit);
    }
  }

  get current(): number {
    return this.currentGlobal;
  }

  currentFor(toolName: string): number {
    return this.currentPerTool.get(toolName) ?? 0;
  }

  canStart(toolName: string): boolean {
    if (this.currentGlobal >= this.maxGlobal) {
      return false;
    }
    const limit = this.perToolLimits.get(toolName);
    return limit === undefined || this.currentFor(toolName) < limit;
  }

  start(toolName: string): void {
    this.currentGlobal++;
    this.currentPerTool.set(toolName, this.currentFor(toolName) + 1);
  }

  complete(toolName: string): void {
    const current = this.currentFor(toolName);
    if (current === 0) {
      return;
    }
    this.currentGlobal--;
    if (current === 1) {
      this.currentPerTool.delete(toolName);
    } else {
      this.currentPerTool.set(toolName, current - 1);
    }
  }

  /**
   * Run `body` holding one slot; the slot is released on every exit path.
   * Rejects with ConcurrencyLimitError, touching no counter, when full.
   */
  async execute<T>(toolName: string, body: () => Promise<T>): Promise<T> {
    if (!this.canStart(toolName)) {
      throw this.limitError(toolName);
    }

    this.start(toolName);
    try {
      return await body();
    } finally {
      this.complete(toolName);
    }
  }

  limitError(toolName: string): ConcurrencyLimitError {
    if (this.currentGlobal >= this.maxGlobal) {
      return new ConcurrencyLimitError(toolName, this.currentGlobal, this.maxGlobal);
    }
    return new ConcurrencyLimitError(
      toolName,
      this.currentFor(toolName),
      this.perToolLimits.get(toolName) ?? this.maxGlobal
    );
  }

  snapshot(): ConcurrencySnapshot {
    return {
      currentGlobal: this.currentGlobal,
      maxGlobal: this.maxGlobal,
      currentPerTool: Object.fromEntries(this.currentPerTool),
      perToolLimits: Object.fromEntries(this.perToolLimits),
    };
  }
}
