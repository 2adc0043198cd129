import type { ConfigTree, ConfigValue } from "../types/config-tree.js";

export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function splitPath(path: string): string[] {
  return path.split(".").filter((p) => p.length > 0);
}

/** Look up a dotted path. Returns undefined when any segment is missing or not a map. */
export function getPath(tree: ConfigTree, path: string): ConfigValue | undefined {
  let current: ConfigValue = tree;
  for (const part of splitPath(path)) {
    if (!isConfigTree(current) || !Object.prototype.hasOwnProperty.call(current, part)) return undefined;
    current = current[part];
  }
  return current;
}

/** Return a copy of tree with value set at path; intermediate maps are created or replaced as needed. */
export function setPath(tree: ConfigTree, path: string, value: ConfigValue): ConfigTree {
  const [head, ...rest] = splitPath(path);
  if (head === undefined) return tree;
  if (rest.length === 0) return { ...tree, [head]: value };
  const child = tree[head];
  return { ...tree, [head]: setPath(isConfigTree(child) ? child : {}, rest.join("."), value) };
}

/** Dotted paths of every non-map value, depth first in key order. */
export function leafPaths(tree: ConfigTree, prefix = ""): string[] {
  const paths: string[] = [];
  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isConfigTree(value) && Object.keys(value).length > 0) {
      paths.push(...leafPaths(value, path));
    } else {
      paths.push(path);
    }
  }
  return paths;
}

/** Freeze value and everything below it in place. */
export function deepFreeze<T extends ConfigValue>(value: T): T {
  if (Array.isArray(value)) {
    for (const item of value) deepFreeze(item);
    Object.freeze(value);
  } else if (isConfigTree(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** True when services.<name>.enable is true. */
export function isServiceEnabled(tree: ConfigTree, service: string): boolean {
  return getPath(tree, `services.${service}.enable`) === true;
}

/** True when the map at the dotted path exists and has enable: true. */
export function isModuleEnabled(tree: ConfigTree, path: string): boolean {
  const node = getPath(tree, path);
  return isConfigTree(node) && node.enable === true;
}
