/** A scalar, list or nested map inside a settings tree. */
export type ConfigValue = string | number | boolean | null | ConfigValue[] | ConfigTree;

/** Nested mapping of string keys to settings values; the universal settings representation. */
export interface ConfigTree {
  [key: string]: ConfigValue;
}
