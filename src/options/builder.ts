// Option builder: typed, documented option descriptors for declaration sites.
// Every builder returns a frozen descriptor; construction checks descriptor shape
// (non-empty enum, min <= max) but never the default value itself. Value checks
// live in check.ts so a bad default is reported like any other bad value.
import { ComposeError, ComposeErrorCode } from "../shared/errors.js";
import type {
  OptionDescriptor,
  OptionSchema,
  BoolOption,
  PortOption,
  PathOption,
  StringListOption,
  EnumOption,
  PercentageOption,
  MemoryOption,
  ScheduleOption,
  IntRangeOption,
  NetworkOption,
  SubmoduleOption,
  StringOption,
  IntOption,
} from "../types/option.js";
import type { ConfigTree } from "../types/config-tree.js";

/** Generic builder; checks the invariants every kind-specific builder relies on. */
export function mkModuleOption<T extends OptionDescriptor>(descriptor: T): T {
  const d: OptionDescriptor = descriptor;
  if (d.description.trim().length === 0) {
    throw new ComposeError(ComposeErrorCode.INVALID_DESCRIPTOR, "Option description must not be empty", { kind: d.kind });
  }
  if (d.kind === "enum" && d.allowedValues.length === 0) {
    throw new ComposeError(ComposeErrorCode.INVALID_DESCRIPTOR, `Enum option "${d.description}" needs at least one allowed value`);
  }
  if ((d.kind === "percentage" || d.kind === "intRange") && d.min > d.max) {
    throw new ComposeError(
      ComposeErrorCode.INVALID_DESCRIPTOR,
      `Option "${d.description}" has min ${d.min} greater than max ${d.max}`,
      { min: d.min, max: d.max },
    );
  }
  Object.freeze(descriptor);
  return descriptor;
}

export function mkBoolOption(params: { default?: boolean; description: string; example?: boolean }): BoolOption {
  return mkModuleOption({ kind: "bool", ...params });
}

export function mkServiceEnableOption(name: string, description: string): BoolOption {
  return mkModuleOption({ kind: "bool", default: false, description: `${name} - ${description}`, example: true });
}

export function mkPortOption(params: { default: number; description?: string; example?: number }): PortOption {
  return mkModuleOption({
    kind: "port",
    default: params.default,
    description: params.description ?? "Port number",
    ...(params.example !== undefined ? { example: params.example } : {}),
  });
}

export function mkPathOption(params: { default?: string; description: string; example?: string }): PathOption {
  return mkModuleOption({ kind: "path", ...params });
}

export function mkStringListOption(params: { default?: readonly string[]; description: string; example?: readonly string[] }): StringListOption {
  return mkModuleOption({ kind: "stringList", ...params, default: params.default ?? [] });
}

export function mkEnumOption(params: { values: readonly string[]; default: string; description: string; example?: string }): EnumOption {
  const { values, ...rest } = params;
  return mkModuleOption({ kind: "enum", allowedValues: Object.freeze([...values]), ...rest });
}

export function mkPercentageOption(params: { default: number; description: string }): PercentageOption {
  return mkModuleOption({ kind: "percentage", min: 0, max: 100, ...params });
}

export function mkMemoryOption(params: { default?: string; description: string; example?: string }): MemoryOption {
  return mkModuleOption({ kind: "memory", ...params, example: params.example ?? "2G" });
}

export function mkScheduleOption(params: { default?: string; description?: string } = {}): ScheduleOption {
  return mkModuleOption({
    kind: "schedule",
    default: params.default ?? "daily",
    description: params.description ?? "Schedule in systemd timer format",
    example: "weekly",
  });
}

export function mkIntRangeOption(params: { min: number; max: number; default: number; description: string }): IntRangeOption {
  return mkModuleOption({ kind: "intRange", ...params, example: params.default });
}

export function mkNetworkOption(params: { default?: string; description: string; example?: string }): NetworkOption {
  return mkModuleOption({ kind: "network", ...params, example: params.example ?? "192.168.1.0/24" });
}

export function mkSubmoduleOption(params: { options: OptionSchema; description: string; default?: ConfigTree }): SubmoduleOption {
  return mkModuleOption({ kind: "submodule", ...params, default: params.default ?? {} });
}

export function mkStringOption(params: Omit<StringOption, "kind">): StringOption {
  return mkModuleOption({ kind: "string", ...params });
}

export function mkIntOption(params: Omit<IntOption, "kind">): IntOption {
  return mkModuleOption({ kind: "int", ...params });
}

/** Start/end pair for a daily HH:MM window, e.g. an update reboot window. */
export function mkTimeWindowOptions(params: { startDefault?: string; endDefault?: string; description?: string } = {}): {
  start: StringOption;
  end: StringOption;
} {
  const description = params.description ?? "Time window";
  return {
    start: mkStringOption({
      format: "timeOfDay",
      default: params.startDefault ?? "02:00",
      description: `${description} start time (HH:MM format)`,
      example: "03:00",
    }),
    end: mkStringOption({
      format: "timeOfDay",
      default: params.endDefault ?? "05:00",
      description: `${description} end time (HH:MM format)`,
      example: "06:00",
    }),
  };
}

/** `<prefix>limit` / `<prefix>burst` options for firewall rate limiting. */
export function mkRateLimitOptions(params: { limitDefault?: string; burstDefault?: number; prefix?: string } = {}): Record<string, StringOption | IntOption> {
  const prefix = params.prefix ?? "";
  return {
    [`${prefix}limit`]: mkStringOption({
      format: "rateLimit",
      default: params.limitDefault ?? "1/s",
      description: "Rate limit (e.g., '1/s', '10/m')",
      example: "5/s",
    }),
    [`${prefix}burst`]: mkIntOption({
      default: params.burstDefault ?? 3,
      description: "Burst size for rate limiting",
      example: 5,
    }),
  };
}
