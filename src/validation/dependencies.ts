// Dependency enforcement and startup ordering over the service graph.
// Ordering is Kahn-style with a fixed tie-break: at every step the earliest service
// (input order) whose in-set dependencies are all emitted goes next. Dependencies
// outside the requested set do not constrain the order; checkDependencies reports them.
import type { CycleError, DependencyError } from "../types/validation.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

export type DependencyMap = ReadonlyMap<string, readonly string[]>;

/** Fails for each dependency of an enabled service that is not itself enabled. */
export function checkDependencies(
  service: string,
  enabled: ReadonlySet<string>,
  dependsOn: DependencyMap,
): Result<void, DependencyError[]> {
  if (!enabled.has(service)) return ok(undefined);
  const missing = (dependsOn.get(service) ?? []).filter((d) => !enabled.has(d));
  if (missing.length === 0) return ok(undefined);
  return err(missing.map((m): DependencyError => ({
    kind: "dependency",
    service,
    missing: m,
    message: `Service ${service} requires: ${m}`,
  })));
}

/** Services ordered so each appears after everything it depends on within the set. */
export function resolveDependencyOrder(services: Iterable<string>, dependsOn: DependencyMap): Result<string[], CycleError> {
  const input = [...new Set(services)];
  const members = new Set(input);
  const depsOf = (s: string): string[] => (dependsOn.get(s) ?? []).filter((d) => members.has(d));

  const emitted = new Set<string>();
  const order: string[] = [];

  while (order.length < input.length) {
    const next = input.find((s) => !emitted.has(s) && depsOf(s).every((d) => emitted.has(d)));
    if (next === undefined) {
      const cycle = findCycle(input.filter((s) => !emitted.has(s)), depsOf, emitted);
      const error: CycleError = {
        kind: "cycle",
        cycle,
        message: `Circular dependency detected: ${[...cycle, cycle[0]].join(" -> ")}`,
      };
      return err(error);
    }
    emitted.add(next);
    order.push(next);
  }

  return ok(order);
}

// Every blocked service has at least one blocked dependency, so walking first
// blocked dependencies from any blocked service must revisit a node.
function findCycle(blocked: string[], depsOf: (s: string) => string[], emitted: ReadonlySet<string>): string[] {
  const walk: string[] = [];
  let current: string | undefined = blocked[0];
  while (current !== undefined && !walk.includes(current)) {
    walk.push(current);
    current = depsOf(current).find((d) => !emitted.has(d));
  }
  return current === undefined ? walk : walk.slice(walk.indexOf(current));
}
