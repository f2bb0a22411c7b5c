import { ValidationError } from "../core/errors";

export type JsonSchema = {
  type?: string;
  description?: string;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  $defs?: Record<string, JsonSchema>;
  $ref?: string;
  minItems?: number;
  minLength?: number;
  pattern?: string;
  minimum?: number;
  maximum?: number;
  enum?: unknown[];
  oneOf?: JsonSchema[];
};

export type SchemaValidationOptions = {
  /** Skip `required` checks, for override files that only name what they change. */
  allowPartial?: boolean;
  schemaName?: string;
};

export class SchemaValidationError extends ValidationError {
  readonly location: string;

  constructor(schemaName: string, location: string, problem: string) {
    super(`${schemaName} is invalid at ${location}: ${problem}`);
    this.name = "SchemaValidationError";
    this.location = location;
  }
}

type Context = {
  root: JsonSchema;
  schemaName: string;
  allowPartial: boolean;
};

export function validateAgainstSchema(
  value: unknown,
  schema: JsonSchema,
  options: SchemaValidationOptions = {}
): void {
  const { allowPartial = false, schemaName = "Value" } = options;
  validate(value, schema, "$", { root: schema, schemaName, allowPartial });
}

function fail(ctx: Context, at: string, problem: string): never {
  throw new SchemaValidationError(ctx.schemaName, at, problem);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function resolveRef(schema: JsonSchema, ctx: Context, at: string): JsonSchema {
  if (!schema.$ref) return schema;
  const prefix = "#/$defs/";
  if (!schema.$ref.startsWith(prefix)) {
    fail(ctx, at, `unsupported $ref "${schema.$ref}"`);
  }
  const target = ctx.root.$defs?.[schema.$ref.slice(prefix.length)];
  if (!target) {
    fail(ctx, at, `unresolved $ref "${schema.$ref}"`);
  }
  return resolveRef(target, ctx, at);
}

function validate(value: unknown, rawSchema: JsonSchema, at: string, ctx: Context): void {
  const schema = resolveRef(rawSchema, ctx, at);

  if (schema.oneOf && schema.oneOf.length > 0) {
    const problems: string[] = [];
    for (const option of schema.oneOf) {
      try {
        validate(value, option, at, ctx);
        return;
      } catch (error) {
        if (!(error instanceof SchemaValidationError)) throw error;
        problems.push(error.message);
      }
    }
    fail(ctx, at, `matches none of the allowed shapes (${problems.join(" | ")})`);
  }

  if (schema.enum && !schema.enum.includes(value)) {
    fail(ctx, at, `must be one of ${schema.enum.map((v) => JSON.stringify(v)).join(", ")}`);
  }

  switch (schema.type) {
    case "object":
      validateObject(value, schema, at, ctx);
      return;
    case "array":
      validateArray(value, schema, at, ctx);
      return;
    case "string":
      validateString(value, schema, at, ctx);
      return;
    case "boolean":
      if (typeof value !== "boolean") fail(ctx, at, "expected a boolean");
      return;
    case "number":
    case "integer":
      validateNumber(value, schema, at, ctx);
      return;
    default:
      // No type: anything goes.
      return;
  }
}

function validateObject(value: unknown, schema: JsonSchema, at: string, ctx: Context): void {
  if (!isRecord(value)) fail(ctx, at, "expected an object");

  const properties = schema.properties ?? {};
  const required = ctx.allowPartial ? [] : schema.required ?? [];

  for (const key of required) {
    if (!(key in value)) fail(ctx, at, `missing required key "${key}"`);
  }

  for (const [key, child] of Object.entries(value)) {
    const childAt = `${at}.${key}`;
    const known = properties[key];
    if (known) {
      validate(child, known, childAt, ctx);
    } else if (schema.additionalProperties === false) {
      fail(ctx, at, `unknown key "${key}"`);
    } else if (typeof schema.additionalProperties === "object") {
      validate(child, schema.additionalProperties, childAt, ctx);
    }
  }
}

function validateArray(value: unknown, schema: JsonSchema, at: string, ctx: Context): void {
  if (!Array.isArray(value)) fail(ctx, at, "expected an array");
  if (typeof schema.minItems === "number" && value.length < schema.minItems) {
    fail(ctx, at, `expected at least ${schema.minItems} item(s)`);
  }
  const items = schema.items;
  if (items) {
    value.forEach((item, index) => validate(item, items, `${at}[${index}]`, ctx));
  }
}

function validateString(value: unknown, schema: JsonSchema, at: string, ctx: Context): void {
  if (typeof value !== "string") fail(ctx, at, "expected a string");
  if (typeof schema.minLength === "number" && value.length < schema.minLength) {
    fail(ctx, at, `expected at least ${schema.minLength} character(s)`);
  }
  if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
    fail(ctx, at, `must match /${schema.pattern}/`);
  }
}

function validateNumber(value: unknown, schema: JsonSchema, at: string, ctx: Context): void {
  if (typeof value !== "number" || Number.isNaN(value)) fail(ctx, at, "expected a number");
  if (schema.type === "integer" && !Number.isInteger(value)) {
    fail(ctx, at, "expected an integer");
  }
  if (typeof schema.minimum === "number" && value < schema.minimum) {
    fail(ctx, at, `must be >= ${schema.minimum}`);
  }
  if (typeof schema.maximum === "number" && value > schema.maximum) {
    fail(ctx, at, `must be <= ${schema.maximum}`);
  }
}
