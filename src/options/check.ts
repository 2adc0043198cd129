import { z } from "zod";
import type { OptionDescriptor, OptionSchema, StringFormat } from "../types/option.js";
import { isOptionDescriptor } from "../types/option.js";
import type { ConfigTree, ConfigValue } from "../types/config-tree.js";
import type { ValidationError } from "../types/validation.js";
import { isConfigTree } from "../tree/tree.js";
import {
  parseMemorySize,
  parseCidr,
  isSemanticCidr,
  parseSchedule,
  cronRangeIssues,
  parseTimeOfDay,
  isSemanticTimeOfDay,
  parseRateLimit,
} from "./values.js";

export interface CheckOptions {
  /** Also check value ranges inside string-encoded values (CIDR octets, cron fields, HH:MM). */
  readonly semantic?: boolean;
}

export const PORT_MIN = 1;
export const PORT_MAX = 65535;

export function inBounds(value: number, min: number, max: number): boolean {
  return value >= min && value <= max;
}

function boundsOf(d: OptionDescriptor): { min: number; max: number } | null {
  if (d.kind === "port") return { min: PORT_MIN, max: PORT_MAX };
  if (d.kind === "percentage" || d.kind === "intRange") return { min: d.min, max: d.max };
  return null;
}

function stringFormat(format: StringFormat | undefined, semantic: boolean): z.ZodTypeAny {
  if (format === "timeOfDay") {
    return z.string().superRefine((s, ctx) => {
      const t = parseTimeOfDay(s);
      if (!t) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected HH:MM, received "${s}"` });
      else if (semantic && !isSemanticTimeOfDay(t)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${s}" is not a time of day` });
    });
  }
  if (format === "rateLimit") {
    return z.string().refine((s) => parseRateLimit(s) !== null, (s) => ({ message: `Expected a rate like 1/s or 10/m, received "${s}"` }));
  }
  return z.string();
}

/** Zod schema of one descriptor. Submodules become objects of optional fields. */
export function optionToZod(d: OptionDescriptor, opts: CheckOptions = {}): z.ZodTypeAny {
  const semantic = opts.semantic ?? false;
  switch (d.kind) {
    case "bool":
      return z.boolean();
    case "port":
      return z.number().int().min(PORT_MIN).max(PORT_MAX);
    case "path":
      return z.string().refine((s) => s.length > 0, { message: "Path must not be empty" });
    case "stringList":
      return z.array(z.string());
    case "enum": {
      const allowed = d.allowedValues;
      return z.string().refine((s) => allowed.includes(s), (s) => ({
        message: `"${s}" is not one of: ${allowed.join(", ")}`,
      }));
    }
    case "percentage":
    case "intRange":
      return z.number().int().min(d.min).max(d.max);
    case "memory":
      return z.string().refine((s) => parseMemorySize(s) !== null, (s) => ({
        message: `Expected a memory size like 512M or 2G, received "${s}"`,
      }));
    case "schedule":
      return z.string().superRefine((s, ctx) => {
        const schedule = parseSchedule(s);
        if (!schedule) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${s}" is neither a calendar period nor a 5-field cron expression` });
          return;
        }
        if (!semantic) return;
        for (const issue of cronRangeIssues(schedule)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue });
      });
    case "network":
      return z.string().superRefine((s, ctx) => {
        const cidr = parseCidr(s);
        if (!cidr) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a CIDR like 192.168.1.0/24, received "${s}"` });
        else if (semantic && !isSemanticCidr(cidr)) ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${s}" is not a valid IPv4 network` });
      });
    case "submodule":
      return schemaToZod(d.options, opts);
    case "string":
      return stringFormat(d.format, semantic);
    case "int":
      return z.number().int();
  }
}

/** Zod object mirroring an option schema; every field optional since defaults fill them. */
export function schemaToZod(schema: OptionSchema, opts: CheckOptions = {}): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const [name, entry] of Object.entries(schema)) {
    const field = isOptionDescriptor(entry) ? optionToZod(entry, opts) : schemaToZod(entry, opts);
    shape[name] = isOptionDescriptor(entry) ? field.describe(entry.description).optional() : field.optional();
  }
  return z.object(shape).passthrough();
}

export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "object") return "map";
  return typeof value;
}

function joinPath(base: string, segments: ReadonlyArray<string | number>): string {
  return segments.reduce<string>((acc, seg) => (typeof seg === "number" ? `${acc}[${seg}]` : acc ? `${acc}.${seg}` : seg), base);
}

/** Check one value against its descriptor. Empty array means the value is acceptable. */
export function checkOptionValue(d: OptionDescriptor, value: unknown, path: string, opts: CheckOptions = {}): ValidationError[] {
  if (d.kind === "submodule") {
    if (!isConfigTree(value)) {
      return [{ kind: "type", path, expected: "submodule", received: typeName(value), message: `${path}: expected a map, received ${typeName(value)}` }];
    }
    return checkTree(d.options, value, { ...opts, prefix: path }).errors;
  }

  const errors: ValidationError[] = [];
  const bounds = boundsOf(d);
  if (bounds && typeof value === "number" && !inBounds(value, bounds.min, bounds.max)) {
    errors.push({
      kind: "bounds",
      path,
      value,
      min: bounds.min,
      max: bounds.max,
      message: `${path}: ${value} is outside ${bounds.min}-${bounds.max}`,
    });
  }

  const parsed = optionToZod(d, opts).safeParse(value);
  if (parsed.success) return errors;

  for (const issue of parsed.error.issues) {
    // range issues are already reported as bounds errors above
    if (bounds && (issue.code === "too_small" || issue.code === "too_big")) continue;
    const issuePath = joinPath(path, issue.path);
    errors.push({ kind: "type", path: issuePath, expected: d.kind, received: typeName(value), message: `${issuePath}: ${issue.message}` });
  }
  return errors;
}

function defaultValue(d: OptionDescriptor): ConfigValue | undefined {
  switch (d.kind) {
    case "stringList":
      return d.default === undefined ? undefined : [...d.default];
    case "submodule":
      return d.default === undefined ? undefined : structuredClone(d.default);
    default:
      return d.default;
  }
}

export interface TreeCheckResult {
  readonly tree: ConfigTree;
  readonly errors: ValidationError[];
}

/**
 * Fill absent values from defaults and check every declared value, filled defaults
 * included. Keys the schema does not declare pass through untouched.
 */
export function checkTree(schema: OptionSchema, tree: ConfigTree, opts: CheckOptions & { prefix?: string } = {}): TreeCheckResult {
  const prefix = opts.prefix ?? "";
  const result: ConfigTree = { ...tree };
  const errors: ValidationError[] = [];

  for (const [name, entry] of Object.entries(schema)) {
    const path = prefix ? `${prefix}.${name}` : name;
    const current: ConfigValue | undefined = tree[name];

    if (isOptionDescriptor(entry)) {
      let value: ConfigValue | undefined = current;
      if (value === undefined) {
        value = defaultValue(entry);
        if (value === undefined) continue;
      }
      if (entry.kind === "submodule" && isConfigTree(value)) {
        const nested = checkTree(entry.options, value, { ...opts, prefix: path });
        result[name] = nested.tree;
        errors.push(...nested.errors);
      } else {
        result[name] = value;
        errors.push(...checkOptionValue(entry, value, path, opts));
      }
      continue;
    }

    if (current === undefined || isConfigTree(current)) {
      const nested = checkTree(entry, current ?? {}, { ...opts, prefix: path });
      if (current !== undefined || Object.keys(nested.tree).length > 0) result[name] = nested.tree;
      errors.push(...nested.errors);
    } else {
      errors.push({ kind: "type", path, expected: "submodule", received: typeName(current), message: `${path}: expected a map, received ${typeName(current)}` });
    }
  }

  return { tree: result, errors };
}
