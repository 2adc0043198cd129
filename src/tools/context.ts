import type { ComposerConfig } from "../types/config.js";
import type { ConfigTree } from "../types/config-tree.js";
import type { OptionSchema } from "../types/option.js";
import type { ProfileTable } from "../types/profile.js";
import type { ServiceCatalog } from "../types/service.js";
import type { Assertion } from "../validation/assertions.js";
import type { ToolRegistry } from "./registry.js";

/**
 * Shared server context, created once at startup and handed to every tool module.
 * Profiles and catalog are loaded up front; tools never touch the filesystem.
 */
export interface ToolContext {
  readonly config: ComposerConfig;
  readonly profiles: ProfileTable;
  /** Where the profile table came from: a directory path or "builtin". */
  readonly profilesSource: string;
  readonly catalog: ServiceCatalog;
  readonly schema: OptionSchema;
  readonly assertions: (tree: ConfigTree) => readonly Assertion[];
  readonly registry: ToolRegistry;
  readonly configPath: string;
  readonly firstRun: boolean;
}
