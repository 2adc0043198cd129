import { z } from "zod";
import type { ConfigTree, ConfigValue } from "../types/config-tree.js";

export const ConfigValueSchema: z.ZodType<ConfigValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(ConfigValueSchema), ConfigTreeSchema]),
);

export const ConfigTreeSchema: z.ZodType<ConfigTree> = z.lazy(() => z.record(ConfigValueSchema));

/** Human-readable one-liners for zod issues, e.g. "performance.kernel: Expected string, received object". */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}
