import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export function toJsonSchema(schema: ZodTypeAny, title?: string): Record<string, unknown> {
  const jsonSchema: Record<string, unknown> = {
    ...zodToJsonSchema(schema, { $refStrategy: 'none', target: 'openApi3' }),
  };
  delete jsonSchema.$schema;
  delete jsonSchema.definitions;
  return title ? { title, ...jsonSchema } : jsonSchema;
}
