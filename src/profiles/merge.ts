import type { ConfigTree } from "../types/config-tree.js";
import { isConfigTree } from "../tree/tree.js";

/**
 * Deep merge override into base (base provides defaults, override wins).
 * Nested maps merge key by key; scalars, lists and null replace wholesale,
 * including a map in base replaced by a non-map override. Neither input is modified.
 */
export function deepMerge(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const key of Object.keys(override)) {
    const baseVal = base[key];
    const overrideVal = override[key];
    if (isConfigTree(baseVal) && isConfigTree(overrideVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else {
      result[key] = overrideVal;
    }
  }
  return result;
}

/** Apply override layers in order; later layers win. */
export function mergeLayers(base: ConfigTree, layers: readonly ConfigTree[]): ConfigTree {
  return layers.reduce<ConfigTree>((acc, layer) => deepMerge(acc, layer), base);
}
