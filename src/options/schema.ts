import type { OptionDescriptor, OptionSchema } from "../types/option.js";
import { isOptionDescriptor } from "../types/option.js";

export interface SchemaEntry {
  readonly path: string;
  readonly descriptor: OptionDescriptor;
}

/** Every descriptor in the schema with its dotted path, depth first. Submodule children follow their parent. */
export function flattenSchema(schema: OptionSchema, prefix = ""): SchemaEntry[] {
  const entries: SchemaEntry[] = [];
  for (const [name, entry] of Object.entries(schema)) {
    const path = prefix ? `${prefix}.${name}` : name;
    if (isOptionDescriptor(entry)) {
      entries.push({ path, descriptor: entry });
      if (entry.kind === "submodule") entries.push(...flattenSchema(entry.options, path));
    } else {
      entries.push(...flattenSchema(entry, path));
    }
  }
  return entries;
}

export function findOption(schema: OptionSchema, path: string): OptionDescriptor | undefined {
  return flattenSchema(schema).find((e) => e.path === path)?.descriptor;
}
