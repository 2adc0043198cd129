import { zodToJsonSchema } from "zod-to-json-schema";
import type { OptionSchema } from "../types/option.js";
import { flattenSchema } from "./schema.js";
import { schemaToZod } from "./check.js";

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/** Markdown reference: one section per option path, optionally limited to a subtree. */
export function generateOptionDocs(schema: OptionSchema, prefix?: string): string {
  return flattenSchema(schema)
    .filter(({ path }) => !prefix || path === prefix || path.startsWith(`${prefix}.`))
    .map(({ path, descriptor }) => {
      const lines = [`## ${path}`, descriptor.description || "No description"];
      if (descriptor.default !== undefined) lines.push(`Default: \`${render(descriptor.default)}\``);
      if (descriptor.example !== undefined) lines.push(`Example: \`${render(descriptor.example)}\``);
      return lines.join("\n");
    })
    .join("\n\n");
}

export function schemaToJsonSchema(schema: OptionSchema, name = "SystemConfig") {
  return zodToJsonSchema(schemaToZod(schema), name);
}
