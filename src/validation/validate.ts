// Single validation entry point. Every check runs and every failure is collected,
// so one pass reports all problems instead of stopping at the first.
import type { ConfigTree } from "../types/config-tree.js";
import type { OptionSchema } from "../types/option.js";
import type { ServiceCatalog } from "../types/service.js";
import type { ValidationError, ValidationReport } from "../types/validation.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { checkTree, PORT_MIN, PORT_MAX } from "../options/check.js";
import { collectPortClaims, checkPortConflicts, checkServiceConflicts } from "./conflicts.js";
import { checkDependencies, resolveDependencyOrder } from "./dependencies.js";
import { buildServiceEntries, dependencyMap, servicePortTypeErrors } from "./services.js";
import { failedAssertions } from "./assertions.js";
import type { Assertion } from "./assertions.js";
import { isValidPort } from "./validators.js";
import { logger } from "../logger.js";

export interface ValidationContext {
  readonly catalog: ServiceCatalog;
  readonly schema?: OptionSchema;
  readonly assertions?: (tree: ConfigTree) => readonly Assertion[];
  readonly semantic?: boolean;
}

// A port set through a schema-declared option is range-checked twice: once as an
// option value, once as a claim. Both produce the same message.
function uniqueErrors(errors: readonly ValidationError[]): ValidationError[] {
  const seen = new Set<string>();
  return errors.filter((e) => {
    const key = `${e.kind}|${e.message}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function validate(tree: ConfigTree, ctx: ValidationContext): Result<ValidationReport, ValidationError[]> {
  const errors: ValidationError[] = [];

  let checked = tree;
  if (ctx.schema) {
    const result = checkTree(ctx.schema, tree, { semantic: ctx.semantic });
    checked = result.tree;
    errors.push(...result.errors);
  }

  // schema-declared ports (services.openssh.port) were already type-checked above
  const reported = new Set(errors.map((e) => ("path" in e ? e.path : "")));
  errors.push(...servicePortTypeErrors(checked).filter((e) => !reported.has(e.path)));

  const entries = buildServiceEntries(checked, ctx.catalog);
  const enabledServices = entries.filter((e) => e.enabled).map((e) => e.name);
  const enabled = new Set(enabledServices);

  for (const entry of entries.filter((e) => e.enabled)) {
    const path = entry.portsPath ?? `services.${entry.name}.ports`;
    for (const port of entry.ports.filter((p) => !isValidPort(p))) {
      errors.push({ kind: "bounds", path, value: port, min: PORT_MIN, max: PORT_MAX, message: `${path}: ${port} is outside ${PORT_MIN}-${PORT_MAX}` });
    }
  }

  const claims = collectPortClaims(entries);
  const ports = checkPortConflicts(claims);
  if (!ports.ok) errors.push(...ports.error);

  const exclusive = checkServiceConflicts(enabled, ctx.catalog.conflictGroups);
  if (!exclusive.ok) errors.push(...exclusive.error);

  const deps = dependencyMap(entries);
  for (const service of enabledServices) {
    const result = checkDependencies(service, enabled, deps);
    if (!result.ok) errors.push(...result.error);
  }

  const order = resolveDependencyOrder(enabledServices, deps);
  if (!order.ok) errors.push(order.error);

  if (ctx.assertions) errors.push(...failedAssertions(ctx.assertions(checked)));

  if (errors.length > 0) {
    const unique = uniqueErrors(errors);
    logger.debug({ errors: unique.length, kinds: [...new Set(unique.map((e) => e.kind))] }, "Validation failed");
    return err(unique);
  }
  return ok({ tree: checked, enabledServices, startupOrder: order.ok ? order.value : [] });
}
