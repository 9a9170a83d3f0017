/**
 * JSON Schema helpers: tool-name sanitization for HTTP paths and
 * JSON Schema to Zod conversion for request validation.
 *
 * Shared by Capability Discovery (which rejects schemas that cannot be
 * compiled), the Schema Translator and the Dynamic Router.
 */

import { z } from "zod";
import type { SchemaIssue } from "../utils/errors.js";

export type JsonSchema = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ── toPathSegment ─────────────────────────────────────────────────────────────

const UNSAFE_SEGMENT_CHARS = /[^A-Za-z0-9_-]+/g;

/**
 * Sanitize a tool name into a URL path segment.
 * Runs of characters outside `[A-Za-z0-9_-]` become a single `_`, and
 * leading/trailing `_` are trimmed. Returns null when nothing usable is left.
 */
export function toPathSegment(name: string): string | null {
  const sanitized = name.replace(UNSAFE_SEGMENT_CHARS, "_").replace(/^_+|_+$/g, "");
  return sanitized.length > 0 ? sanitized : null;
}

/**
 * "get_current_weather" → "Get Current Weather"
 */
export function toSummary(name: string): string {
  return name
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

// ── jsonSchemaToZod ───────────────────────────────────────────────────────────

function unionOf(schemas: z.ZodTypeAny[]): z.ZodTypeAny {
  const [first, second, ...rest] = schemas;
  if (!first) return z.never();
  if (!second) return first;
  return z.union([first, second, ...rest]);
}

function numberConstraints(base: z.ZodNumber, schema: JsonSchema): z.ZodNumber {
  let numberSchema = base;
  if (typeof schema.minimum === "number") {
    numberSchema = numberSchema.min(schema.minimum);
  }
  if (typeof schema.maximum === "number") {
    numberSchema = numberSchema.max(schema.maximum);
  }
  if (typeof schema.exclusiveMinimum === "number") {
    numberSchema = numberSchema.gt(schema.exclusiveMinimum);
  }
  if (typeof schema.exclusiveMaximum === "number") {
    numberSchema = numberSchema.lt(schema.exclusiveMaximum);
  }
  if (typeof schema.multipleOf === "number") {
    numberSchema = numberSchema.multipleOf(schema.multipleOf);
  }
  return numberSchema;
}

function stringSchemaToZod(schema: JsonSchema): z.ZodTypeAny {
  let stringSchema = z.string();

  // Apply string format constraints
  switch (schema.format) {
    case "email":
      stringSchema = stringSchema.email();
      break;
    case "uuid":
      stringSchema = stringSchema.uuid();
      break;
    case "uri":
    case "url":
      stringSchema = stringSchema.url();
      break;
    case "date-time":
      stringSchema = stringSchema.datetime({ offset: true });
      break;
  }

  if (typeof schema.minLength === "number") {
    stringSchema = stringSchema.min(schema.minLength);
  }
  if (typeof schema.maxLength === "number") {
    stringSchema = stringSchema.max(schema.maxLength);
  }
  if (typeof schema.pattern === "string") {
    // Throws on an invalid pattern, which discovery reports as an invalid schema
    stringSchema = stringSchema.regex(new RegExp(schema.pattern, "u"));
  }

  return stringSchema;
}

function objectSchemaToZod(schema: JsonSchema): z.ZodTypeAny {
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = new Set(
    Array.isArray(schema.required) ? schema.required.filter((key): key is string => typeof key === "string") : []
  );

  // Built from entries so that keys such as "__proto__" stay own properties
  const entries: Array<[string, z.ZodTypeAny]> = Object.entries(properties).map(([key, propertySchema]): [string, z.ZodTypeAny] => {
    const zodSchema = jsonSchemaToZod(propertySchema);
    if (!required.has(key)) return [key, zodSchema.optional()];
    return [key, zodSchema.isOptional() ? presentValue(zodSchema) : zodSchema];
  });

  // Required keys without a property definition still have to be present
  const defined = new Set(entries.map(([key]) => key));
  for (const key of required) {
    if (!defined.has(key)) {
      entries.push([key, presentValue(z.unknown())]);
    }
  }

  const objectSchema = z.object(Object.fromEntries(entries));
  if (schema.additionalProperties === false) {
    return objectSchema.strict();
  }
  if (isRecord(schema.additionalProperties)) {
    return objectSchema.catchall(jsonSchemaToZod(schema.additionalProperties));
  }
  return objectSchema.passthrough();
}

/** A schema that also accepts undefined, narrowed to reject a missing value. */
function presentValue(schema: z.ZodTypeAny): z.ZodTypeAny {
  return schema.refine((value) => value !== undefined, { message: "Required" });
}

function arraySchemaToZod(schema: JsonSchema): z.ZodTypeAny {
  const itemSchema = schema.items !== undefined ? jsonSchemaToZod(schema.items) : z.unknown();
  let arraySchema = z.array(itemSchema);

  if (typeof schema.minItems === "number") {
    arraySchema = arraySchema.min(schema.minItems);
  }
  if (typeof schema.maxItems === "number") {
    arraySchema = arraySchema.max(schema.maxItems);
  }

  return arraySchema;
}

function literalOf(value: unknown): z.ZodTypeAny {
  if (value === null) return z.null();
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return z.literal(value);
  }
  // Structured constants are compared by their JSON text
  const expected = JSON.stringify(value);
  return z.unknown().refine((candidate) => JSON.stringify(candidate) === expected, {
    message: `Expected ${expected}`,
  });
}

function typedSchemaToZod(type: string, schema: JsonSchema): z.ZodTypeAny {
  switch (type) {
    case "object":
      return objectSchemaToZod(schema);
    case "array":
      return arraySchemaToZod(schema);
    case "string":
      return stringSchemaToZod(schema);
    case "number":
      return numberConstraints(z.number(), schema);
    case "integer":
      return numberConstraints(z.number().int(), schema);
    case "boolean":
      return z.boolean();
    case "null":
      return z.null();
    default:
      throw new Error(`Unsupported JSON Schema type "${type}"`);
  }
}

/** Exactly one alternative must accept the value. */
function exactlyOneOf(alternatives: z.ZodTypeAny[]): z.ZodTypeAny {
  return z.unknown().superRefine((value, ctx) => {
    const matches = alternatives.filter((alternative) => alternative.safeParse(value).success).length;
    if (matches !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          matches === 0
            ? "Value does not match any of the allowed schemas"
            : `Value matches ${matches} schemas where exactly one is allowed`,
      });
    }
  });
}

/** Validator for the type keywords (`type`, `properties`, `required`), or null when there are none. */
function typeKeywordsToZod(schema: JsonSchema): z.ZodTypeAny | null {
  if (Array.isArray(schema.type)) {
    const types = schema.type.filter((type): type is string => typeof type === "string");
    return unionOf(types.map((type) => typedSchemaToZod(type, schema)));
  }

  if (typeof schema.type === "string") {
    return typedSchemaToZod(schema.type, schema);
  }

  if (schema.type !== undefined) {
    throw new Error("Schema 'type' must be a string or an array of strings");
  }

  // Untyped schema with properties is treated as an object
  if (isRecord(schema.properties) || Array.isArray(schema.required)) {
    return objectSchemaToZod(schema);
  }

  return null;
}

/**
 * Convert a JSON Schema (draft 7 / 2020-12 subset used by MCP tools) into a
 * Zod validator. Unknown keywords are ignored; structurally invalid schemas
 * throw, so callers can treat a throw as "schema not usable".
 *
 * Keywords combine the way JSON Schema does: `enum`, `const`, `anyOf`,
 * `oneOf` and each `allOf` member must all hold alongside the type keywords.
 */
export function jsonSchemaToZod(schema: unknown): z.ZodTypeAny {
  if (schema === true || schema === undefined) {
    return z.unknown();
  }
  if (schema === false) {
    return z.never();
  }
  if (!isRecord(schema)) {
    throw new Error("Schema must be an object or boolean");
  }

  const parts: z.ZodTypeAny[] = [];

  const typed = typeKeywordsToZod(schema);
  if (typed) parts.push(typed);

  if (Array.isArray(schema.enum)) {
    parts.push(unionOf(schema.enum.map(literalOf)));
  }
  if ("const" in schema) {
    parts.push(literalOf(schema.const));
  }
  if (Array.isArray(schema.anyOf)) {
    parts.push(unionOf(schema.anyOf.map((alternative) => jsonSchemaToZod(alternative))));
  }
  if (Array.isArray(schema.oneOf)) {
    parts.push(exactlyOneOf(schema.oneOf.map((alternative) => jsonSchemaToZod(alternative))));
  }
  if (Array.isArray(schema.allOf)) {
    parts.push(...schema.allOf.map((subSchema) => jsonSchemaToZod(subSchema)));
  }

  const [first, ...rest] = parts;
  if (!first) return z.unknown();
  return rest.reduce<z.ZodTypeAny>((merged, next) => z.intersection(merged, next), first);
}

/**
 * Flatten Zod issues into `{ path, message }` pairs with dotted paths
 * ("items.0.name"); the root is reported as "(root)".
 */
export function toSchemaIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}
