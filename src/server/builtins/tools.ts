import { setTimeout as delay } from 'timers/promises';
import { z } from 'zod';
import type { ToolDefinition } from '../../types/handlers.js';

const EchoParamsSchema = z.object({
  text: z.string().describe('Text to send back'),
});

export const echoTool: ToolDefinition<z.infer<typeof EchoParamsSchema>, { text: string }> = {
  name: 'echo',
  description: 'Return the given text unchanged',
  paramsSchema: EchoParamsSchema,
  readOnly: true,
  idempotent: true,
  handler: ({ text }) => ({ text }),
};

const SleepParamsSchema = z.object({
  durationMs: z
    .number()
    .int()
    .min(0)
    .max(600_000)
    .describe('Total time to wait in milliseconds'),
  steps: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(10)
    .describe('Number of progress updates'),
});

interface SleepResult {
  sleptMs: number;
  steps: number;
}

/**
 * Waits in equal steps, reporting progress after each one. Stops at the next
 * step boundary, or mid-wait, once its token is cancelled.
 */
export const sleepTool: ToolDefinition<z.infer<typeof SleepParamsSchema>, SleepResult> = {
  name: 'sleep',
  description: 'Wait for a while, reporting progress; useful for testing cancellation and timeouts',
  paramsSchema: SleepParamsSchema,
  readOnly: true,
  async handler({ durationMs, steps }, cancelToken, progress) {
    const stepMs = durationMs / steps;

    for (let step = 1; step <= steps; step++) {
      cancelToken.throwIfCancelled();
      try {
        await delay(stepMs, undefined, { signal: cancelToken.signal });
      } catch (error) {
        cancelToken.throwIfCancelled();
        throw error;
      }
      await progress.notify(`Step ${step} of ${steps}`, Math.round((step * 100) / steps));
    }

    return { sleptMs: durationMs, steps };
  },
};
