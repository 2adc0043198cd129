import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, success, error } from "../helpers.js";
import { ConfigValueSchema } from "../../tree/schema.js";
import { findOption } from "../../options/schema.js";
import { checkOptionValue } from "../../options/check.js";
import { generateOptionDocs, schemaToJsonSchema } from "../../options/docs.js";

const CheckInput = z.object({
  path: z.string().min(1).describe("Dotted option path, e.g. performance.zram.memoryPercent"),
  value: ConfigValueSchema.describe("Candidate value"),
  semantic: z.boolean().optional(),
});

const DocsInput = z.object({
  prefix: z.string().optional().describe("Only document options at or below this path"),
  format: z.enum(["markdown", "json_schema"]).optional().default("markdown"),
});

export function registerOptionTools(ctx: ToolContext): void {
  registerTool(ctx, {
    name: "cfg_check_option",
    description: "Check one candidate value against the declared option at a path: kind, bounds and value format.",
    module: "options",
    inputSchema: CheckInput,
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const input = CheckInput.parse(args);
    const descriptor = findOption(ctx.schema, input.path);
    if (!descriptor) {
      return error("cfg_check_option", null, {
        code: "OPTION_NOT_FOUND",
        category: "not_found",
        message: `No option is declared at "${input.path}"`,
        remediation: ["Run cfg_option_docs to list the declared option paths"],
      });
    }
    const errors = checkOptionValue(descriptor, input.value, input.path, {
      semantic: input.semantic ?? ctx.config.validation.semantic_checks,
    });
    return success("cfg_check_option", null, {
      path: input.path,
      kind: descriptor.kind,
      valid: errors.length === 0,
      ...(errors.length ? { errors } : {}),
    });
  });

  registerTool(ctx, {
    name: "cfg_option_docs",
    description: "Reference documentation for the declared options, as markdown or as a JSON Schema of the whole settings tree.",
    module: "options",
    inputSchema: DocsInput,
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const input = DocsInput.parse(args);
    if (input.format === "json_schema") {
      return success("cfg_option_docs", null, { format: "json_schema", schema: schemaToJsonSchema(ctx.schema) });
    }
    const markdown = generateOptionDocs(ctx.schema, input.prefix);
    if (!markdown) {
      return error("cfg_option_docs", null, {
        code: "OPTION_NOT_FOUND",
        category: "not_found",
        message: `No options are declared under "${input.prefix ?? ""}"`,
        remediation: ["Omit prefix to document every option"],
      });
    }
    return success("cfg_option_docs", null, { format: "markdown", markdown });
  });
}
