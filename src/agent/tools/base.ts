import type { ToolDefinition } from "../../providers/base.js";
import { isRecord } from "../../utils/helpers.js";

/** Conversation a capability call belongs to. Passed per call; tools keep no per-chat state. */
export interface ToolContext {
  channel: string;
  chatId: string;
  sessionKey: string;
  messageId?: string;
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, unknown>;
  execute(args: Record<string, unknown>, ctx: ToolContext): Promise<string>;
}

const typeMap: Record<string, (v: unknown) => boolean> = {
  string: (v) => typeof v === "string",
  integer: (v) => Number.isInteger(v),
  number: (v) => typeof v === "number" && Number.isFinite(v),
  boolean: (v) => typeof v === "boolean",
  array: (v) => Array.isArray(v),
  object: isRecord,
};

function validateValue(value: unknown, schema: Record<string, unknown>, label: string): string[] {
  const t = typeof schema.type === "string" ? schema.type : undefined;
  const check = t ? typeMap[t] : undefined;
  if (check && !check(value)) return [`${label} should be ${t}`];

  const errors: string[] = [];
  if (Array.isArray(schema.enum) && !schema.enum.includes(value)) errors.push(`${label} must be one of ${JSON.stringify(schema.enum)}`);
  if (typeof value === "number") {
    if (typeof schema.minimum === "number" && value < schema.minimum) errors.push(`${label} must be >= ${schema.minimum}`);
    if (typeof schema.maximum === "number" && value > schema.maximum) errors.push(`${label} must be <= ${schema.maximum}`);
  }
  if (typeof value === "string") {
    if (typeof schema.minLength === "number" && value.length < schema.minLength) errors.push(`${label} must be at least ${schema.minLength} chars`);
    if (typeof schema.maxLength === "number" && value.length > schema.maxLength) errors.push(`${label} must be at most ${schema.maxLength} chars`);
  }
  if (t === "object" && isRecord(value)) {
    const props = isRecord(schema.properties) ? schema.properties : {};
    const required = Array.isArray(schema.required) ? schema.required : [];
    const child = (k: string) => (label === "parameter" ? k : `${label}.${k}`);
    for (const req of required) {
      if (typeof req === "string" && !(req in value)) errors.push(`missing required ${child(req)}`);
    }
    for (const [k, v] of Object.entries(value)) {
      const propSchema = props[k];
      if (isRecord(propSchema)) errors.push(...validateValue(v, propSchema, child(k)));
    }
  }
  if (t === "array" && Array.isArray(value) && isRecord(schema.items)) {
    const items = schema.items;
    value.forEach((item, i) => errors.push(...validateValue(item, items, `${label}[${i}]`)));
  }
  return errors;
}

/** Checks arguments against the JSON-schema subset tools declare. Returns human-readable problems. */
export function validateParams(tool: Tool, params: Record<string, unknown>): string[] {
  if (tool.parameters.type !== "object") {
    throw new Error(`Schema must be object type, got ${String(tool.parameters.type)}`);
  }
  return validateValue(params, tool.parameters, "parameter");
}

export function toDefinition(tool: Tool): ToolDefinition {
  return { type: "function", function: { name: tool.name, description: tool.description, parameters: tool.parameters } };
}

export function stringArg(args: Record<string, unknown>, key: string): string | undefined {
  const v = args[key];
  return typeof v === "string" ? v : undefined;
}
