import type { ConflictGroup, PortClaim, ServiceEntry } from "../types/service.js";
import type { ConflictError } from "../types/validation.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";

/** Ports claimed by enabled services, in entry order. Disabled services claim nothing. */
export function collectPortClaims(entries: readonly ServiceEntry[]): PortClaim[] {
  return entries.filter((e) => e.enabled).flatMap((e) => e.ports.map((port) => ({ service: e.name, port })));
}

/**
 * Fails when any port is claimed more than once. One error per duplicated port,
 * ascending by port, naming the claimants in claim order.
 */
export function checkPortConflicts(claims: readonly PortClaim[]): Result<void, ConflictError[]> {
  const byPort = new Map<number, string[]>();
  for (const claim of claims) {
    const owners = byPort.get(claim.port) ?? [];
    owners.push(claim.service);
    byPort.set(claim.port, owners);
  }

  const errors: ConflictError[] = [...byPort.entries()]
    .filter(([, owners]) => owners.length > 1)
    .sort(([a], [b]) => a - b)
    .map(([port, owners]): ConflictError => ({
      kind: "conflict",
      resource: "port",
      port,
      services: owners,
      message: `Port conflict detected: ${port} claimed by ${owners.join(", ")}`,
    }));

  return errors.length > 0 ? err(errors) : ok(undefined);
}

/** Fails for every group with more than one enabled member. */
export function checkServiceConflicts(enabled: ReadonlySet<string>, groups: readonly ConflictGroup[]): Result<void, ConflictError[]> {
  const errors: ConflictError[] = [];
  for (const group of groups) {
    const active = group.services.filter((s) => enabled.has(s));
    if (active.length > 1) {
      errors.push({
        kind: "conflict",
        resource: "service",
        services: active,
        message: `Service conflict: ${group.message}`,
      });
    }
  }
  return errors.length > 0 ? err(errors) : ok(undefined);
}
