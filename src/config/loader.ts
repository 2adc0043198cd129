// Config loader: reads ~/.config/sysconfig-compose/config.yaml and deep-merges it over the defaults.
// With no file present the defaults are written out and firstRun is true.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import type { ComposerConfig } from "../types/config.js";
import { ComposerConfigSchema } from "../types/config.js";
import { ConfigTreeSchema, formatIssues } from "../tree/schema.js";
import { deepMerge } from "../profiles/merge.js";
import { logger } from "../logger.js";

export const CONFIG_PATH_ENV = "SYSCONFIG_COMPOSE_CONFIG";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "sysconfig-compose", "config.yaml");

export const DEFAULT_CONFIG: ComposerConfig = {
  default_profile: "workstation",
  profiles_dir: null,
  catalog: { additional_paths: [] },
  validation: { semantic_checks: false },
  output: { include_tree: true },
};

const DEFAULT_CONFIG_YAML = `# sysconfig-compose configuration
# Generated automatically on first run. All values shown are defaults.

# Profile used when a tool call names none: minimal | workstation | server
default_profile: workstation

# Directory holding baseline.yaml and <profile>.yaml (null = built-in profiles)
profiles_dir: null

catalog:
  # Extra service catalog files; entries replace built-in services of the same name
  additional_paths: []

validation:
  # Range-check CIDR octets, cron fields and HH:MM times in addition to their shape
  semantic_checks: false

output:
  # Include the resolved settings tree in cfg_compose responses
  include_tree: true
`;

export interface ConfigResult {
  config: ComposerConfig;
  configPath: string;
  firstRun: boolean;
}

function cloneDefaults(): ComposerConfig {
  return structuredClone(DEFAULT_CONFIG);
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env[CONFIG_PATH_ENV] ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (error) {
      logger.warn({ configPath, error }, "Could not write default config file");
    }
    return { config: cloneDefaults(), configPath, firstRun: true };
  }

  try {
    const raw: unknown = parseYaml(readFileSync(configPath, "utf-8"));
    const tree = ConfigTreeSchema.safeParse(raw ?? {});
    if (!tree.success) throw new Error(formatIssues(tree.error).join("; "));

    const merged = ComposerConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, tree.data));
    if (!merged.success) throw new Error(formatIssues(merged.error).join("; "));
    return { config: merged.data, configPath, firstRun: false };
  } catch (error) {
    logger.error({ configPath, error }, "Failed to parse config, using defaults");
    return { config: cloneDefaults(), configPath, firstRun: false };
  }
}
