/**
 * JSON Schema to Zod Schema Converter
 *
 * Converts the JSON Schemas declared for tool parameters and structured
 * outputs into Zod schemas for runtime validation.
 */

import { z } from 'zod';

type SchemaNode = Record<string, unknown>;

function isSchemaNode(value: unknown): value is SchemaNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberField(schema: SchemaNode, key: string): number | undefined {
  const value = schema[key];
  return typeof value === 'number' ? value : undefined;
}

/**
 * Convert JSON Schema to Zod schema at runtime
 *
 * Supported: object, array, string, number/integer, boolean, null,
 * `enum`, and `type` given as a list of types. Nodes without a known
 * `type` accept any value.
 *
 * @throws Error if the schema is not an object
 */
export function jsonSchemaToZod(jsonSchema: unknown): z.ZodTypeAny {
  if (!isSchemaNode(jsonSchema)) {
    throw new Error('JSON Schema must be an object');
  }

  const type = jsonSchema.type;

  if (Array.isArray(type)) {
    return convertUnion(jsonSchema, type);
  }

  if (Array.isArray(jsonSchema.enum) && type !== 'string') {
    const allowed: unknown[] = jsonSchema.enum;
    return z.unknown().refine((value) => allowed.includes(value), {
      message: `Expected one of ${JSON.stringify(allowed)}`,
    });
  }

  switch (type) {
    case 'object':
      return convertObject(jsonSchema);
    case 'array':
      return convertArray(jsonSchema);
    case 'string':
      return convertString(jsonSchema);
    case 'number':
    case 'integer':
      return convertNumber(jsonSchema);
    case 'boolean':
      return z.boolean();
    case 'null':
      return z.null();
    default:
      return z.unknown();
  }
}

/**
 * `type: ["string", "null"]` and friends
 */
function convertUnion(schema: SchemaNode, types: unknown[]): z.ZodTypeAny {
  const members = types.map((type) => jsonSchemaToZod({ ...schema, type }));
  const [first, second, ...rest] = members;
  if (!first) {
    return z.unknown();
  }
  if (!second) {
    return first;
  }
  return z.union([first, second, ...rest]);
}

/**
 * Convert object schema
 */
function convertObject(schema: SchemaNode): z.ZodTypeAny {
  const properties = isSchemaNode(schema.properties) ? schema.properties : {};
  const required = Array.isArray(schema.required) ? schema.required : [];

  const shape: Record<string, z.ZodTypeAny> = {};

  for (const [key, propSchema] of Object.entries(properties)) {
    let zodType = jsonSchemaToZod(propSchema);

    // Make optional if not in required array
    if (!required.includes(key)) {
      zodType = zodType.optional();
    }

    if (isSchemaNode(propSchema) && typeof propSchema.description === 'string') {
      zodType = zodType.describe(propSchema.description);
    }

    shape[key] = zodType;
  }

  const result = z.object(shape);

  // Add strict mode if additionalProperties is false
  return schema.additionalProperties === false ? result.strict() : result.passthrough();
}

/**
 * Convert array schema
 */
function convertArray(schema: SchemaNode): z.ZodTypeAny {
  let result = z.array(schema.items === undefined ? z.unknown() : jsonSchemaToZod(schema.items));

  const minItems = numberField(schema, 'minItems');
  const maxItems = numberField(schema, 'maxItems');
  if (minItems !== undefined) {
    result = result.min(minItems);
  }
  if (maxItems !== undefined) {
    result = result.max(maxItems);
  }

  return result;
}

/**
 * Convert string schema
 */
function convertString(schema: SchemaNode): z.ZodTypeAny {
  // Handle enum first (returns ZodEnum, not ZodString)
  if (Array.isArray(schema.enum)) {
    const values = schema.enum.filter((value): value is string => typeof value === 'string');
    const [first, ...rest] = values;
    if (first !== undefined && values.length === schema.enum.length) {
      return z.enum([first, ...rest]);
    }
  }

  let result = z.string();

  const minLength = numberField(schema, 'minLength');
  const maxLength = numberField(schema, 'maxLength');
  if (minLength !== undefined) {
    result = result.min(minLength);
  }
  if (maxLength !== undefined) {
    result = result.max(maxLength);
  }

  if (typeof schema.pattern === 'string') {
    result = result.regex(new RegExp(schema.pattern));
  }

  // Add format validation (basic support)
  switch (schema.format) {
    case 'email':
      result = result.email();
      break;
    case 'url':
    case 'uri':
      result = result.url();
      break;
    case 'uuid':
      result = result.uuid();
      break;
  }

  return result;
}

/**
 * Convert number/integer schema
 */
function convertNumber(schema: SchemaNode): z.ZodTypeAny {
  let result = schema.type === 'integer' ? z.number().int() : z.number();

  const minimum = numberField(schema, 'minimum');
  const maximum = numberField(schema, 'maximum');
  const exclusiveMinimum = numberField(schema, 'exclusiveMinimum');
  const exclusiveMaximum = numberField(schema, 'exclusiveMaximum');
  const multipleOf = numberField(schema, 'multipleOf');

  if (minimum !== undefined) {
    result = result.min(minimum);
  }
  if (maximum !== undefined) {
    result = result.max(maximum);
  }
  if (exclusiveMinimum !== undefined) {
    result = result.gt(exclusiveMinimum);
  }
  if (exclusiveMaximum !== undefined) {
    result = result.lt(exclusiveMaximum);
  }
  if (multipleOf !== undefined) {
    result = result.multipleOf(multipleOf);
  }

  return result;
}
