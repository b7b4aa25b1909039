import { z } from 'zod';
import type { PromptDefinition } from '../../types/handlers.js';
import { flagLabels } from '../registries/definitionRegistry.js';
import type { ToolRegistry } from '../registries/toolRegistry.js';
import { toJsonSchema } from '../utils/schemaHelpers.js';

const DescribeToolParamsSchema = z.object({
  tool: z.string().min(1).describe('Name of a registered tool'),
});

/**
 * Builds a user message asking the assistant to explain a tool, quoting its
 * description, flags and input schema
 */
export function describeToolPrompt(
  tools: ToolRegistry
): PromptDefinition<z.infer<typeof DescribeToolParamsSchema>> {
  return {
    name: 'describe-tool',
    description: 'Ask for an explanation of a registered tool and how to call it',
    paramsSchema: DescribeToolParamsSchema,
    readOnly: true,
    handler: ({ tool }) => {
      const definition = tools.resolve(tool);
      const flags = flagLabels(definition);
      const lines = [
        `Explain what the tool "${definition.name}" does and how to call it.`,
        `Description: ${definition.description ?? 'none'}`,
      ];
      if (flags.length > 0) {
        lines.push(`Flags: ${flags.join(', ')}`);
      }
      lines.push(
        'Input schema:',
        JSON.stringify(toJsonSchema(definition.paramsSchema), null, 2)
      );

      return {
        description: `Describe the ${definition.name} tool`,
        messages: [{ role: 'user', content: { type: 'text', text: lines.join('\n') } }],
      };
    },
  };
}
