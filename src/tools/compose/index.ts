import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, success, validationFailure } from "../helpers.js";
import { ConfigTreeSchema } from "../../tree/schema.js";
import { resolveSystemConfig } from "../../pipeline/resolve.js";
import { validate } from "../../validation/validate.js";
import { resolveDependencyOrder } from "../../validation/dependencies.js";
import type { DependencyMap } from "../../validation/dependencies.js";
import type { ServiceCatalog } from "../../types/service.js";

const ComposeInput = z.object({
  profile: z.string().optional().describe("Profile to compose; defaults to default_profile from config.yaml"),
  overrides: ConfigTreeSchema.optional().describe("Extra settings merged over the profile before validation"),
  semantic: z.boolean().optional().describe("Range-check CIDR octets, cron fields and HH:MM times"),
  include_tree: z.boolean().optional().describe("Return the resolved settings tree"),
});

const ValidateInput = z.object({
  tree: ConfigTreeSchema.describe("Complete settings tree to validate as-is"),
  semantic: z.boolean().optional(),
});

const ServiceOrderInput = z.object({
  services: z.array(z.string()).min(1).describe("Services to order"),
  dependencies: z.record(z.array(z.string())).optional()
    .describe("service -> services it needs; defaults to the catalog's dependencies"),
});

function catalogDependencies(catalog: ServiceCatalog): DependencyMap {
  return new Map(catalog.services.map((s) => [s.name, s.dependsOn]));
}

export function registerComposeTools(ctx: ToolContext): void {
  registerTool(ctx, {
    name: "cfg_compose",
    description: "Compose a profile over the baseline, apply optional overrides, validate the result and return the service startup order. Fails with every configuration problem found.",
    module: "compose",
    inputSchema: ComposeInput,
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const input = ComposeInput.parse(args);
    const started = Date.now();
    const result = resolveSystemConfig({
      profile: input.profile ?? ctx.config.default_profile,
      profiles: ctx.profiles,
      layers: input.overrides ? [input.overrides] : [],
      catalog: ctx.catalog,
      schema: ctx.schema,
      assertions: ctx.assertions,
      semantic: input.semantic ?? ctx.config.validation.semantic_checks,
    });
    if (!result.ok) return validationFailure("cfg_compose", Date.now() - started, result.error);

    const resolved = result.value;
    const includeTree = input.include_tree ?? ctx.config.output.include_tree;
    return success("cfg_compose", Date.now() - started, {
      profile: resolved.profile,
      startup_order: resolved.startupOrder,
      ...(includeTree ? { tree: resolved.tree } : {}),
    }, { summary: `${resolved.profile}: ${resolved.startupOrder.length} services enabled` });
  });

  registerTool(ctx, {
    name: "cfg_validate",
    description: "Validate a complete settings tree against the option schema, service catalog and built-in assertions without composing a profile.",
    module: "compose",
    inputSchema: ValidateInput,
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const input = ValidateInput.parse(args);
    const started = Date.now();
    const report = validate(input.tree, {
      catalog: ctx.catalog,
      schema: ctx.schema,
      assertions: ctx.assertions,
      semantic: input.semantic ?? ctx.config.validation.semantic_checks,
    });
    if (!report.ok) {
      return success("cfg_validate", Date.now() - started, { valid: false, errors: report.error }, { total: report.error.length });
    }
    return success("cfg_validate", Date.now() - started, {
      valid: true,
      enabled_services: report.value.enabledServices,
      startup_order: report.value.startupOrder,
    });
  });

  registerTool(ctx, {
    name: "cfg_service_order",
    description: "Order services so each starts after the services it depends on. Ties keep the input order; a dependency cycle is reported with its path.",
    module: "compose",
    inputSchema: ServiceOrderInput,
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async (args) => {
    const input = ServiceOrderInput.parse(args);
    const deps: DependencyMap = input.dependencies
      ? new Map(Object.entries(input.dependencies))
      : catalogDependencies(ctx.catalog);
    const order = resolveDependencyOrder(input.services, deps);
    if (!order.ok) return validationFailure("cfg_service_order", null, [order.error]);
    return success("cfg_service_order", null, { order: order.value }, { total: order.value.length });
  });
}
