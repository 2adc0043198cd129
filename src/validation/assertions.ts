import type { ConfigTree } from "../types/config-tree.js";
import type { AssertionError } from "../types/validation.js";
import { isServiceEnabled } from "../tree/tree.js";

/** A named condition the composed tree must satisfy. */
export interface Assertion {
  readonly assertion: boolean;
  readonly message: string;
}

export function mkAssertion(condition: boolean, message: string): Assertion {
  return { assertion: condition, message: `Configuration error: ${message}` };
}

export function requireServices(tree: ConfigTree, services: readonly string[]): Assertion[] {
  return services.map((s) => mkAssertion(isServiceEnabled(tree, s), `${s} service must be enabled`));
}

export function mutuallyExclusive(options: ReadonlyArray<{ name: string; value: boolean }>): Assertion {
  const active = options.filter((o) => o.value);
  return mkAssertion(active.length <= 1, `Options ${options.map((o) => o.name).join(", ")} are mutually exclusive`);
}

/** option implies dependency. */
export function requiresOption(option: boolean, dependency: boolean, message: string): Assertion {
  return mkAssertion(!option || dependency, message);
}

export function failedAssertions(assertions: readonly Assertion[]): AssertionError[] {
  return assertions.filter((a) => !a.assertion).map((a): AssertionError => ({ kind: "assertion", message: a.message }));
}
