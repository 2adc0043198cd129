import type { ConfigTree } from "../types/config-tree.js";
import { getPath, isServiceEnabled } from "../tree/tree.js";
import type { Assertion } from "../validation/assertions.js";
import { mkAssertion, requiresOption } from "../validation/assertions.js";

const flag = (tree: ConfigTree, path: string): boolean => getPath(tree, path) === true;

/** Cross-option constraints of the system tree that single-option checks cannot express. */
export function systemAssertions(tree: ConfigTree): Assertion[] {
  const backupPaths = getPath(tree, "backup.paths");
  const filesystemEnabled = flag(tree, "performance.filesystem.enable");

  return [
    requiresOption(
      isServiceEnabled(tree, "backup"),
      Array.isArray(backupPaths) && backupPaths.length > 0,
      "backup.paths must not be empty when the backup service is enabled",
    ),
    requiresOption(
      flag(tree, "performance.filesystem.enableNocow"),
      filesystemEnabled,
      "performance.filesystem.enableNocow requires performance.filesystem.enable",
    ),
    requiresOption(
      flag(tree, "performance.filesystem.enableTmpfs"),
      filesystemEnabled,
      "performance.filesystem.enableTmpfs requires performance.filesystem.enable",
    ),
    requiresOption(
      flag(tree, "maintenance.autoUpdate.allowReboot"),
      flag(tree, "maintenance.autoUpdate.enable"),
      "maintenance.autoUpdate.allowReboot requires maintenance.autoUpdate.enable",
    ),
    requiresOption(
      flag(tree, "desktop.enable"),
      isServiceEnabled(tree, "pipewire"),
      "the desktop requires the pipewire service for audio",
    ),
    mkAssertion(
      getPath(tree, "security.profile") !== "hardened" || getPath(tree, "performance.kernel.enableMitigations") !== false,
      "hardened security profile cannot run with CPU mitigations disabled",
    ),
  ];
}
