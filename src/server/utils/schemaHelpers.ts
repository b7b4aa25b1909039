import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const EMPTY_OBJECT_SCHEMA = { type: 'object', properties: {} };

/**
 * Render a zod schema as an inline JSON Schema for the wire listing.
 * Definitions without a schema accept any object.
 */
export function toJsonSchema(schema?: ZodTypeAny): Record<string, unknown> {
  if (!schema) {
    return { ...EMPTY_OBJECT_SCHEMA };
  }
  const jsonSchema: Record<string, unknown> = {
    ...zodToJsonSchema(schema, { $refStrategy: 'none' }),
  };
  delete jsonSchema.$schema;
  return jsonSchema;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

/**
 * Prompt arguments in the listing shape: one entry per top-level property
 */
export function toPromptArguments(schema?: ZodTypeAny): PromptArgument[] {
  const jsonSchema = toJsonSchema(schema);
  const properties = jsonSchema.properties;
  if (typeof properties !== 'object' || properties === null) {
    return [];
  }
  const required = Array.isArray(jsonSchema.required) ? jsonSchema.required : [];

  return Object.entries(properties).map(([name, property]: [string, unknown]) => {
    const argument: PromptArgument = { name };
    if (
      typeof property === 'object' &&
      property !== null &&
      'description' in property &&
      typeof property.description === 'string'
    ) {
      argument.description = property.description;
    }
    if (required.includes(name)) {
      argument.required = true;
    }
    return argument;
  });
}
