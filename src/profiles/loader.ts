// Profile table loader: reads baseline.yaml and <profile>.yaml from a directory.
// baseline.yaml is required; a missing profile file just leaves that profile
// unregistered, so compose() reports it as unknown.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { ConfigTree } from "../types/config-tree.js";
import type { OverridesTable, ProfileTable } from "../types/profile.js";
import { PROFILE_TYPES } from "../types/profile.js";
import { ConfigTreeSchema, formatIssues } from "../tree/schema.js";
import { ComposeError, ComposeErrorCode } from "../shared/errors.js";
import { BUILTIN_PROFILES_DIR } from "../paths.js";
import { logger } from "../logger.js";

/** Parse one YAML document as a settings tree. An empty document is an empty tree. */
export function parseTreeYaml(text: string, source: string): ConfigTree {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (e) {
    throw new ComposeError(ComposeErrorCode.PROFILE_LOAD_FAILED, `${source}: invalid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  const parsed = ConfigTreeSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ComposeError(ComposeErrorCode.PROFILE_LOAD_FAILED, `${source}: not a settings tree`, { issues: formatIssues(parsed.error) });
  }
  return parsed.data;
}

function readTree(path: string): ConfigTree {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e) {
    throw new ComposeError(ComposeErrorCode.PROFILE_LOAD_FAILED, `Could not read ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseTreeYaml(text, path);
}

export function loadProfileTable(dir: string = BUILTIN_PROFILES_DIR): ProfileTable {
  const baseline = readTree(join(dir, "baseline.yaml"));
  const overrides: OverridesTable = {};
  for (const profile of PROFILE_TYPES) {
    const path = join(dir, `${profile}.yaml`);
    if (existsSync(path)) overrides[profile] = readTree(path);
  }
  logger.info({ dir, profiles: Object.keys(overrides) }, "Profile table loaded");
  return { baseline, overrides };
}
