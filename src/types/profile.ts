import type { ConfigTree } from "./config-tree.js";

/** Registered profile selectors. */
export const PROFILE_TYPES = ["minimal", "workstation", "server"] as const;

export type ProfileType = (typeof PROFILE_TYPES)[number];

export function isProfileType(value: string): value is ProfileType {
  return (PROFILE_TYPES as readonly string[]).includes(value);
}

/** Per-profile override trees. A profile without an entry cannot be composed. */
export type OverridesTable = Partial<Record<ProfileType, ConfigTree>>;

/** Baseline defaults plus the override table they are composed with. */
export interface ProfileTable {
  readonly baseline: ConfigTree;
  readonly overrides: OverridesTable;
}

/** Final settings tree after composition and validation. Frozen. */
export interface ResolvedConfig {
  readonly profile: ProfileType;
  readonly tree: Readonly<ConfigTree>;
  readonly startupOrder: readonly string[];
}
