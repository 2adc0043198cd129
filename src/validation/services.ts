import type { ConfigTree, ConfigValue } from "../types/config-tree.js";
import type { ServiceCatalog, ServiceEntry } from "../types/service.js";
import { getPath, isConfigTree, isServiceEnabled } from "../tree/tree.js";
import type { ValueTypeError } from "../types/validation.js";
import { typeName } from "../options/check.js";
import type { DependencyMap } from "./dependencies.js";

function portList(value: ConfigValue): number[] | null {
  if (!Array.isArray(value)) return null;
  const ports: number[] = [];
  for (const v of value) {
    if (typeof v !== "number" || !Number.isInteger(v)) return null;
    ports.push(v);
  }
  return ports;
}

function singlePort(value: ConfigValue): number | null {
  return typeof value === "number" && Number.isInteger(value) ? value : null;
}

// A malformed override claims no ports; servicePortTypeErrors reports it.
function treePorts(tree: ConfigTree, service: string): { ports: number[]; path: string } | null {
  const listPath = `services.${service}.ports`;
  const list = getPath(tree, listPath);
  if (list !== undefined) return { ports: portList(list) ?? [], path: listPath };
  const singlePath = `services.${service}.port`;
  const single = getPath(tree, singlePath);
  if (single !== undefined) {
    const port = singlePort(single);
    return { ports: port === null ? [] : [port], path: singlePath };
  }
  return null;
}

/** services.<name>.ports that is not a list of integers, or services.<name>.port that is not an integer. */
export function servicePortTypeErrors(tree: ConfigTree): ValueTypeError[] {
  const services = getPath(tree, "services");
  if (!isConfigTree(services)) return [];
  const errors: ValueTypeError[] = [];
  for (const [name, svc] of Object.entries(services)) {
    if (!isConfigTree(svc)) continue;
    const list = svc.ports;
    if (list !== undefined && portList(list) === null) {
      const path = `services.${name}.ports`;
      errors.push({ kind: "type", path, expected: "port", received: typeName(list), message: `${path}: expected a list of port numbers, received ${JSON.stringify(list)}` });
    }
    const single = svc.port;
    if (single !== undefined && singlePort(single) === null) {
      const path = `services.${name}.port`;
      errors.push({ kind: "type", path, expected: "port", received: typeName(single), message: `${path}: expected a port number, received ${JSON.stringify(single)}` });
    }
  }
  return errors;
}

/**
 * Service entries for one validation pass: catalog services in catalog order, then
 * any other enabled services.<name> in tree order. services.<name>.ports (a list of
 * numbers) or services.<name>.port replaces the catalog's default ports, even when
 * malformed.
 */
export function buildServiceEntries(tree: ConfigTree, catalog: ServiceCatalog): ServiceEntry[] {
  const entries: ServiceEntry[] = catalog.services.map((svc): ServiceEntry => {
    const fromTree = treePorts(tree, svc.name);
    return {
      name: svc.name,
      enabled: isServiceEnabled(tree, svc.name),
      ports: fromTree ? fromTree.ports : [...svc.ports],
      dependsOn: [...svc.dependsOn],
      ...(fromTree ? { portsPath: fromTree.path } : {}),
    };
  });

  const known = new Set(catalog.services.map((s) => s.name));
  const services = getPath(tree, "services");
  if (isConfigTree(services)) {
    for (const name of Object.keys(services)) {
      if (known.has(name) || !isServiceEnabled(tree, name)) continue;
      const fromTree = treePorts(tree, name);
      entries.push({
        name,
        enabled: true,
        ports: fromTree ? fromTree.ports : [],
        dependsOn: [],
        ...(fromTree ? { portsPath: fromTree.path } : {}),
      });
    }
  }
  return entries;
}

export function dependencyMap(entries: readonly ServiceEntry[]): DependencyMap {
  return new Map(entries.map((e) => [e.name, e.dependsOn]));
}
