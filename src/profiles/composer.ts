// Profile composer: deep-merges one profile's overrides onto the shared baseline.
// A selector outside the table is an error, never a fallback to some default profile.
import type { ConfigTree } from "../types/config-tree.js";
import type { OverridesTable, ProfileType } from "../types/profile.js";
import { isProfileType, PROFILE_TYPES } from "../types/profile.js";
import type { UnknownKeyError, UnknownProfileError, ValidationError } from "../types/validation.js";
import type { Result } from "../types/result.js";
import { ok, err } from "../types/result.js";
import { ComposeError } from "../shared/errors.js";
import { isConfigTree } from "../tree/tree.js";
import { deepMerge } from "./merge.js";

/** Override keys that the baseline does not have. A map override may only descend into a map baseline. */
export function checkOverrideKeys(baseline: ConfigTree, overrides: ConfigTree, prefix = ""): UnknownKeyError[] {
  const errors: UnknownKeyError[] = [];
  for (const [key, value] of Object.entries(overrides)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (!Object.prototype.hasOwnProperty.call(baseline, key)) {
      errors.push({ kind: "unknown_key", path, message: `Override key "${path}" does not exist in the baseline` });
      continue;
    }
    const baseVal = baseline[key];
    if (isConfigTree(value) && Object.keys(value).length > 0) {
      if (isConfigTree(baseVal)) {
        errors.push(...checkOverrideKeys(baseVal, value, path));
      } else {
        errors.push(...Object.keys(value).map((k): UnknownKeyError => ({
          kind: "unknown_key",
          path: `${path}.${k}`,
          message: `Override key "${path}.${k}" does not exist in the baseline`,
        })));
      }
    }
  }
  return errors;
}

function unknownProfile(profileType: string, overridesTable: OverridesTable): UnknownProfileError {
  const known = PROFILE_TYPES.filter((p) => overridesTable[p] !== undefined);
  return {
    kind: "unknown_profile",
    profile: profileType,
    known,
    message: `Unknown profile "${profileType}"; registered profiles: ${known.join(", ") || "(none)"}`,
  };
}

export interface ComposedProfile {
  readonly profile: ProfileType;
  readonly tree: ConfigTree;
}

/** Non-throwing compose: unknown profile or unknown override keys come back as errors. */
export function tryCompose(profileType: string, baseline: ConfigTree, overridesTable: OverridesTable): Result<ComposedProfile, ValidationError[]> {
  if (!isProfileType(profileType)) return err([unknownProfile(profileType, overridesTable)]);
  const overrides = overridesTable[profileType];
  if (overrides === undefined) return err([unknownProfile(profileType, overridesTable)]);

  const unknownKeys = checkOverrideKeys(baseline, overrides);
  if (unknownKeys.length > 0) return err(unknownKeys);

  return ok({ profile: profileType, tree: deepMerge(baseline, overrides) });
}

/** Compose or throw ComposeError: a bad selector or a malformed profile table is a programming error. */
export function compose(profileType: string, baseline: ConfigTree, overridesTable: OverridesTable): ConfigTree {
  const result = tryCompose(profileType, baseline, overridesTable);
  if (result.ok) return result.value.tree;

  throw ComposeError.fromCompose(profileType, result.error);
}
