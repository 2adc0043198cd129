// Compose → layer → validate → freeze. Either a complete ResolvedConfig or the full
// list of problems; never a partially applied tree.
import type { ConfigTree } from "../types/config-tree.js";
import type { ProfileTable, ResolvedConfig } from "../types/profile.js";
import type { OptionSchema } from "../types/option.js";
import type { ServiceCatalog } from "../types/service.js";
import type { ValidationError } from "../types/validation.js";
import type { Result } from "../types/result.js";
import { ok } from "../types/result.js";
import type { Assertion } from "../validation/assertions.js";
import { tryCompose } from "../profiles/composer.js";
import { mergeLayers } from "../profiles/merge.js";
import { validate } from "../validation/validate.js";
import { deepFreeze } from "../tree/tree.js";
import { logger } from "../logger.js";

export interface ResolveRequest {
  readonly profile: string;
  readonly profiles: ProfileTable;
  readonly catalog: ServiceCatalog;
  /** Applied after the profile overrides, in order; last wins. */
  readonly layers?: readonly ConfigTree[];
  readonly schema?: OptionSchema;
  readonly assertions?: (tree: ConfigTree) => readonly Assertion[];
  readonly semantic?: boolean;
}

export function resolveSystemConfig(req: ResolveRequest): Result<ResolvedConfig, ValidationError[]> {
  const composed = tryCompose(req.profile, req.profiles.baseline, req.profiles.overrides);
  if (!composed.ok) return composed;
  const { profile, tree } = composed.value;

  const layered = mergeLayers(tree, req.layers ?? []);
  const report = validate(layered, {
    catalog: req.catalog,
    schema: req.schema,
    assertions: req.assertions,
    semantic: req.semantic,
  });
  if (!report.ok) {
    logger.info({ profile: req.profile, errors: report.error.length }, "Configuration rejected");
    return report;
  }

  logger.info({ profile: req.profile, services: report.value.startupOrder.length }, "Configuration resolved");
  return ok({
    profile,
    // unchanged subtrees are shared with the profile table; freeze a copy
    tree: deepFreeze(structuredClone(report.value.tree)),
    startupOrder: Object.freeze([...report.value.startupOrder]),
  });
}
