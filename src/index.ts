// Library entry point. The MCP server lives in server.ts.
export * from "./types/index.js";
export { ComposeError, ComposeErrorCode } from "./shared/errors.js";

export * from "./options/builder.js";
export { checkOptionValue, checkTree, inBounds, optionToZod, schemaToZod, PORT_MIN, PORT_MAX } from "./options/check.js";
export type { CheckOptions, TreeCheckResult } from "./options/check.js";
export { flattenSchema, findOption } from "./options/schema.js";
export type { SchemaEntry } from "./options/schema.js";
export { generateOptionDocs, schemaToJsonSchema } from "./options/docs.js";
export * from "./options/values.js";

export { getPath, setPath, leafPaths, deepFreeze, isConfigTree, isServiceEnabled, isModuleEnabled } from "./tree/tree.js";

export { validate } from "./validation/validate.js";
export type { ValidationContext } from "./validation/validate.js";
export { collectPortClaims, checkPortConflicts, checkServiceConflicts } from "./validation/conflicts.js";
export { checkDependencies, resolveDependencyOrder } from "./validation/dependencies.js";
export type { DependencyMap } from "./validation/dependencies.js";
export { buildServiceEntries, dependencyMap, servicePortTypeErrors } from "./validation/services.js";
export { mkAssertion, requireServices, mutuallyExclusive, requiresOption, failedAssertions } from "./validation/assertions.js";
export type { Assertion } from "./validation/assertions.js";
export * from "./validation/validators.js";

export { deepMerge, mergeLayers } from "./profiles/merge.js";
export { compose, tryCompose, checkOverrideKeys } from "./profiles/composer.js";
export type { ComposedProfile } from "./profiles/composer.js";
export { loadProfileTable, parseTreeYaml } from "./profiles/loader.js";
export { loadServiceCatalog, parseCatalog, mergeCatalogs } from "./catalog/loader.js";

export { systemOptions } from "./schema/system-options.js";
export { systemAssertions } from "./schema/system-assertions.js";
export { resolveSystemConfig } from "./pipeline/resolve.js";
export type { ResolveRequest } from "./pipeline/resolve.js";
export { loadConfig, DEFAULT_CONFIG, CONFIG_PATH_ENV } from "./config/loader.js";
