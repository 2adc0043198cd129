import type { ConfigTree } from "./config-tree.js";

/** Kinds of configurable settings. */
export type OptionKind =
  | "bool"
  | "port"
  | "path"
  | "stringList"
  | "enum"
  | "percentage"
  | "memory"
  | "schedule"
  | "intRange"
  | "network"
  | "submodule"
  | "string"
  | "int";

interface OptionBase<K extends OptionKind, T> {
  readonly kind: K;
  readonly description: string;
  readonly default?: T;
  readonly example?: T;
}

export type BoolOption = OptionBase<"bool", boolean>;
export type PortOption = OptionBase<"port", number>;
export type PathOption = OptionBase<"path", string>;
export type StringListOption = OptionBase<"stringList", readonly string[]>;
export type MemoryOption = OptionBase<"memory", string>;
export type ScheduleOption = OptionBase<"schedule", string>;
export type NetworkOption = OptionBase<"network", string>;
export type IntOption = OptionBase<"int", number>;

export interface EnumOption extends OptionBase<"enum", string> {
  readonly allowedValues: readonly string[];
}

export interface PercentageOption extends OptionBase<"percentage", number> {
  readonly min: number;
  readonly max: number;
}

export interface IntRangeOption extends OptionBase<"intRange", number> {
  readonly min: number;
  readonly max: number;
}

/** Lexical formats a plain string option may be held to. */
export type StringFormat = "timeOfDay" | "rateLimit";

export interface StringOption extends OptionBase<"string", string> {
  readonly format?: StringFormat;
}

export interface SubmoduleOption extends OptionBase<"submodule", ConfigTree> {
  readonly options: OptionSchema;
}

/** Typed, documented schema entry for one configurable setting. */
export type OptionDescriptor =
  | BoolOption
  | PortOption
  | PathOption
  | StringListOption
  | EnumOption
  | PercentageOption
  | MemoryOption
  | ScheduleOption
  | IntRangeOption
  | NetworkOption
  | SubmoduleOption
  | StringOption
  | IntOption;

/** Nested declaration of options, keyed the same way as the settings tree. */
export interface OptionSchema {
  readonly [name: string]: OptionDescriptor | OptionSchema;
}

export function isOptionDescriptor(entry: OptionDescriptor | OptionSchema): entry is OptionDescriptor {
  return typeof entry.kind === "string" && typeof entry.description === "string";
}
