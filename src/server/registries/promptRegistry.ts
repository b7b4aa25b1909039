import { PromptNotFoundError } from '../../types/index.js';
import { DefinitionKind } from '../../types/enums.js';
import type { PromptDefinition } from '../../types/handlers.js';
import { toPromptArguments } from '../utils/schemaHelpers.js';
import { DefinitionRegistry } from './definitionRegistry.js';

export class PromptRegistry extends DefinitionRegistry<PromptDefinition> {
  override readonly kind = DefinitionKind.Prompt;

  protected override keyOf(definition: PromptDefinition): string {
    return definition.name;
  }

  protected override notFound(name: string): PromptNotFoundError {
    return new PromptNotFoundError(name);
  }

  protected override describe(definition: PromptDefinition): Record<string, unknown> {
    return { arguments: toPromptArguments(definition.paramsSchema) };
  }
}
