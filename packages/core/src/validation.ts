/**
 * Tool argument checks and error text cleanup
 * Covers the subset of JSON Schema that tool parameter schemas use in practice
 */

import type { JsonSchema } from "./types/tool.js";

type Schema = Record<string, unknown>;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function matchesType(value: unknown, type: string): boolean {
  if (type === "integer") {
    return typeof value === "number" && Number.isInteger(value);
  }
  if (type === "number") {
    return typeof value === "number";
  }
  return jsonType(value) === type;
}

function numberKeyword(schema: Schema, key: string): number | undefined {
  const value = schema[key];
  return typeof value === "number" ? value : undefined;
}

function declaredTypes(schema: Schema): string[] | undefined {
  const type = schema.type;
  if (typeof type === "string") return [type];
  if (Array.isArray(type)) return type.filter((t): t is string => typeof t === "string");
  return undefined;
}

function checkProperty(value: unknown, schema: Schema, path: string): string[] {
  const types = declaredTypes(schema);
  if (types && !types.some((t) => matchesType(value, t))) {
    return [`${path}: expected ${types.join(" | ")}, got ${jsonType(value)}`];
  }

  const errors: string[] = [];

  if (Array.isArray(schema.enum) && !schema.enum.includes(value)) {
    errors.push(`${path}: must be one of [${schema.enum.join(", ")}]`);
  }

  if (typeof value === "number") {
    const minimum = numberKeyword(schema, "minimum");
    const maximum = numberKeyword(schema, "maximum");
    if (minimum !== undefined && value < minimum) {
      errors.push(`${path}: must be >= ${minimum}`);
    }
    if (maximum !== undefined && value > maximum) {
      errors.push(`${path}: must be <= ${maximum}`);
    }
  }

  if (typeof value === "string") {
    const minLength = numberKeyword(schema, "minLength");
    const maxLength = numberKeyword(schema, "maxLength");
    if (minLength !== undefined && value.length < minLength) {
      errors.push(`${path}: must have at least ${minLength} characters`);
    }
    if (maxLength !== undefined && value.length > maxLength) {
      errors.push(`${path}: must have at most ${maxLength} characters`);
    }
  }

  const items = schema.items;
  if (Array.isArray(value) && isRecord(items)) {
    value.forEach((item, i) => errors.push(...checkProperty(item, items, `${path}[${i}]`)));
  }

  if (isRecord(value) && isRecord(schema.properties)) {
    errors.push(...checkObject(value, schema.properties, requiredFields(schema), path));
  }

  return errors;
}

function requiredFields(schema: Schema): string[] {
  const required = schema.required;
  return Array.isArray(required)
    ? required.filter((r): r is string => typeof r === "string")
    : [];
}

function checkObject(
  value: Record<string, unknown>,
  properties: Record<string, unknown>,
  required: string[],
  prefix: string
): string[] {
  const errors: string[] = [];
  const at = (key: string) => (prefix ? `${prefix}.${key}` : key);

  for (const field of required) {
    if (!Object.hasOwn(value, field)) {
      errors.push(`Missing required field: ${at(field)}`);
    }
  }

  for (const [key, propSchema] of Object.entries(properties)) {
    if (Object.hasOwn(value, key)) {
      errors.push(...checkProperty(value[key], isRecord(propSchema) ? propSchema : {}, at(key)));
    }
  }

  return errors;
}

/**
 * Check tool call arguments against the tool's parameter schema.
 * Returns the list of problems; an empty list means the arguments are acceptable.
 */
export function validateToolArguments(args: unknown, schema: JsonSchema): string[] {
  if (!isRecord(args)) {
    return ["Expected an object"];
  }

  const errors = checkObject(args, schema.properties, schema.required ?? [], "");

  if (schema.additionalProperties === false) {
    for (const key of Object.keys(args)) {
      if (!Object.hasOwn(schema.properties, key)) {
        errors.push(`Unexpected property: ${key}`);
      }
    }
  }

  return errors;
}

/**
 * Mask credentials and user home paths in an error message before it is shown to a model
 */
export function sanitizeError(error: unknown): string {
  let message = error instanceof Error ? error.message : String(error);

  message = message.replace(
    /([a-zA-Z_]*(?:key|token|secret|password|credential)[a-zA-Z_]*)[=:]\s*["']?[^\s"']+["']?/gi,
    "$1=***"
  );
  message = message.replace(/bearer\s+[^\s]+/gi, "bearer ***");
  message = message.replace(/\/home\/[^/\s]+/g, "/home/***");
  message = message.replace(/\/Users\/[^/\s]+/g, "/Users/***");
  message = message.replace(/C:\\Users\\[^\\]+/gi, "C:\\Users\\***");

  return message;
}
