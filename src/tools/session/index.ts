import { z } from "zod";
import type { ToolContext } from "../context.js";
import { registerTool, success } from "../helpers.js";
import { PROFILE_TYPES } from "../../types/profile.js";
import { leafPaths } from "../../tree/tree.js";
import { flattenSchema } from "../../options/schema.js";

export function registerSessionTools(ctx: ToolContext): void {
  registerTool(ctx, {
    name: "cfg_session_info",
    description: "Session context: config file, default profile, registered profiles, service catalog size, declared option count, validation mode. Call this first in every session.",
    module: "session",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async () => {
    const data: Record<string, unknown> = {
      config_path: ctx.configPath,
      default_profile: ctx.config.default_profile,
      registered_profiles: PROFILE_TYPES.filter((p) => ctx.profiles.overrides[p] !== undefined),
      profiles_source: ctx.profilesSource,
      catalog: {
        services: ctx.catalog.services.length,
        conflict_groups: ctx.catalog.conflictGroups.length,
      },
      options_declared: flattenSchema(ctx.schema).length,
      semantic_checks: ctx.config.validation.semantic_checks,
      tools_registered: ctx.registry.size,
      tools_by_module: ctx.registry.countByModule(),
    };

    if (ctx.firstRun) {
      data.setup = {
        first_run: true,
        config_path: ctx.configPath,
        hints: [
          `Review the configuration at ${ctx.configPath}. The defaults are safe to start with.`,
          "Set profiles_dir in config.yaml to compose your own baseline and profiles.",
        ],
      };
    }

    return success("cfg_session_info", null, data);
  });

  registerTool(ctx, {
    name: "cfg_list_profiles",
    description: "List the registered profiles with the setting paths each one overrides on top of the baseline.",
    module: "session",
    inputSchema: z.object({}),
    annotations: { readOnlyHint: true, destructiveHint: false, idempotentHint: true },
  }, async () => {
    const profiles = PROFILE_TYPES.flatMap((name) => {
      const overrides = ctx.profiles.overrides[name];
      if (overrides === undefined) return [];
      return [{ name, default: name === ctx.config.default_profile, overridden_paths: leafPaths(overrides) }];
    });
    return success("cfg_list_profiles", null, {
      baseline_settings: leafPaths(ctx.profiles.baseline).length,
      profiles,
    }, { total: profiles.length });
  });
}
