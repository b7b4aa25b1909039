import { ToolNotFoundError } from '../../types/index.js';
import { DefinitionKind } from '../../types/enums.js';
import type { ToolDefinition } from '../../types/handlers.js';
import { toJsonSchema } from '../utils/schemaHelpers.js';
import { DefinitionRegistry } from './definitionRegistry.js';

export class ToolRegistry extends DefinitionRegistry<ToolDefinition> {
  override readonly kind = DefinitionKind.Tool;

  protected override keyOf(definition: ToolDefinition): string {
    return definition.name;
  }

  protected override notFound(name: string): ToolNotFoundError {
    return new ToolNotFoundError(name);
  }

  protected override describe(definition: ToolDefinition): Record<string, unknown> {
    const summary: Record<string, unknown> = {
      inputSchema: toJsonSchema(definition.paramsSchema),
    };
    if (definition.resultSchema) {
      summary.outputSchema = toJsonSchema(definition.resultSchema);
    }
    return summary;
  }
}
