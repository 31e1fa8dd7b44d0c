// JSON schema (the subset tool descriptors use) to zod validators

import { z, type ZodTypeAny } from 'zod';
import type { JsonSchemaProperty, ToolInputSchema } from './types.js';

function primaryType(property: JsonSchemaProperty): string | undefined {
  if (Array.isArray(property.type)) {
    return property.type.find(t => t !== 'null');
  }
  return property.type;
}

function literalUnion(values: unknown[]): ZodTypeAny {
  const literals = values.filter(
    (v): v is string | number | boolean => ['string', 'number', 'boolean'].includes(typeof v),
  );
  if (literals.length === 0) return z.never();
  if (literals.length === 1) return z.literal(literals[0]);
  const [first, second, ...rest] = literals.map(v => z.literal(v));
  return z.union([first, second, ...rest]);
}

export function propertyToZod(property: JsonSchemaProperty): ZodTypeAny {
  if (property.const !== undefined) {
    return literalUnion([property.const]);
  }
  if (property.enum) {
    return literalUnion(property.enum);
  }

  switch (primaryType(property)) {
    case 'string': {
      let schema = z.string();
      if (property.minLength !== undefined) schema = schema.min(property.minLength);
      if (property.maxLength !== undefined) schema = schema.max(property.maxLength);
      return schema;
    }
    case 'integer':
    case 'number': {
      let schema = primaryType(property) === 'integer' ? z.number().int() : z.number();
      if (property.minimum !== undefined) schema = schema.min(property.minimum);
      if (property.maximum !== undefined) schema = schema.max(property.maximum);
      return schema;
    }
    case 'boolean':
      return z.boolean();
    case 'array':
      return z.array(property.items ? propertyToZod(property.items) : z.unknown());
    case 'object':
      return z.record(z.unknown());
    default:
      return z.unknown();
  }
}

/**
 * Validator for a tool's arguments. Optional properties also accept null,
 * which reasoning backends send for "not provided".
 */
export function buildArgumentValidator(schema: ToolInputSchema): z.ZodType<Record<string, unknown>> {
  const required = new Set(schema.required ?? []);
  const shape: Record<string, ZodTypeAny> = {};

  for (const [name, property] of Object.entries(schema.properties)) {
    const base = propertyToZod(property);
    shape[name] = required.has(name) ? base : base.nullish();
  }

  const object = z.object(shape);
  return schema.additionalProperties === false ? object.strict() : object.passthrough();
}

/** Flattens zod issues into one line for tool results. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
