import { ResourceNotFoundError } from '../../types/index.js';
import { DefinitionKind } from '../../types/enums.js';
import type { ResourceDefinition } from '../../types/handlers.js';
import { DefinitionRegistry } from './definitionRegistry.js';

export const DEFAULT_RESOURCE_MIME_TYPE = 'text/plain';

/**
 * Resources are keyed by uri. A uri ending in `/` is a prefix entry serving
 * every uri beneath it; an exact entry beats any prefix and the longest
 * prefix wins.
 */
export class ResourceRegistry extends DefinitionRegistry<ResourceDefinition> {
  override readonly kind = DefinitionKind.Resource;

  protected override keyOf(definition: ResourceDefinition): string {
    return definition.uri;
  }

  protected override notFound(uri: string): ResourceNotFoundError {
    return new ResourceNotFoundError(uri);
  }

  protected override describe(definition: ResourceDefinition): Record<string, unknown> {
    return {
      uri: definition.uri,
      mimeType: definition.mimeType ?? DEFAULT_RESOURCE_MIME_TYPE,
    };
  }

  override get(uri: string): ResourceDefinition | undefined {
    const exact = this.definitions.get(uri);
    if (exact) {
      return exact;
    }

    let best: ResourceDefinition | undefined;
    for (const [key, definition] of this.definitions) {
      if (
        key.endsWith('/') &&
        uri.startsWith(key) &&
        (!best || key.length > best.uri.length)
      ) {
        best = definition;
      }
    }
    return best;
  }
}
