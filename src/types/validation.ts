import type { OptionKind } from "./option.js";
import type { ConfigTree } from "./config-tree.js";

/** Two or more enabled services claim the same port, or share a mutual-exclusion group. */
export type ConflictError =
  | {
      readonly kind: "conflict";
      readonly resource: "port";
      readonly port: number;
      readonly services: readonly string[];
      readonly message: string;
    }
  | {
      readonly kind: "conflict";
      readonly resource: "service";
      readonly services: readonly string[];
      readonly message: string;
    };

/** An enabled service requires another service that is not enabled. */
export interface DependencyError {
  readonly kind: "dependency";
  readonly service: string;
  readonly missing: string;
  readonly message: string;
}

/** The dependency graph restricted to the requested services is not a DAG. */
export interface CycleError {
  readonly kind: "cycle";
  readonly cycle: readonly string[];
  readonly message: string;
}

export interface UnknownProfileError {
  readonly kind: "unknown_profile";
  readonly profile: string;
  readonly known: readonly string[];
  readonly message: string;
}

/** Override tree names a key the baseline does not have. */
export interface UnknownKeyError {
  readonly kind: "unknown_key";
  readonly path: string;
  readonly message: string;
}

/** Value does not match its descriptor's kind. */
export interface ValueTypeError {
  readonly kind: "type";
  readonly path: string;
  readonly expected: OptionKind;
  readonly received: string;
  readonly message: string;
}

/** Numeric value outside its declared bounds. */
export interface BoundsError {
  readonly kind: "bounds";
  readonly path: string;
  readonly value: number;
  readonly min: number;
  readonly max: number;
  readonly message: string;
}

export interface AssertionError {
  readonly kind: "assertion";
  readonly message: string;
}

export type ValidationError =
  | ConflictError
  | DependencyError
  | CycleError
  | UnknownProfileError
  | UnknownKeyError
  | ValueTypeError
  | BoundsError
  | AssertionError;

export type ValidationErrorKind = ValidationError["kind"];

/** Successful validation pass. tree has schema defaults filled in. */
export interface ValidationReport {
  readonly tree: ConfigTree;
  readonly enabledServices: readonly string[];
  readonly startupOrder: readonly string[];
}
