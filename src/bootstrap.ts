// Startup wiring shared by the stdio server and the tool tests: load profiles and
// catalog per the runtime config, then register every tool module on a fresh registry.
import type { ConfigResult } from "./config/loader.js";
import type { ToolContext } from "./tools/context.js";
import { ToolRegistry } from "./tools/registry.js";
import { loadProfileTable } from "./profiles/loader.js";
import { loadServiceCatalog } from "./catalog/loader.js";
import { systemOptions } from "./schema/system-options.js";
import { systemAssertions } from "./schema/system-assertions.js";
import { registerSessionTools } from "./tools/session/index.js";
import { registerComposeTools } from "./tools/compose/index.js";
import { registerOptionTools } from "./tools/options/index.js";
import { logger } from "./logger.js";

export function createToolContext({ config, configPath, firstRun }: ConfigResult): ToolContext {
  const profiles = config.profiles_dir ? loadProfileTable(config.profiles_dir) : loadProfileTable();
  const catalog = loadServiceCatalog(config.catalog.additional_paths);

  const ctx: ToolContext = {
    config,
    profiles,
    profilesSource: config.profiles_dir ?? "builtin",
    catalog,
    schema: systemOptions,
    assertions: systemAssertions,
    registry: new ToolRegistry(),
    configPath,
    firstRun,
  };

  registerSessionTools(ctx);
  registerComposeTools(ctx);
  registerOptionTools(ctx);
  logger.info({ toolCount: ctx.registry.size }, "All tool modules registered");
  return ctx;
}
