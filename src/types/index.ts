export type { ConfigTree, ConfigValue } from "./config-tree.js";
export type { Result } from "./result.js";
export { ok, err } from "./result.js";
export type {
  OptionKind, OptionDescriptor, OptionSchema, StringFormat,
  BoolOption, PortOption, PathOption, StringListOption, EnumOption, PercentageOption, MemoryOption,
  ScheduleOption, IntRangeOption, NetworkOption, SubmoduleOption, StringOption, IntOption,
} from "./option.js";
export { isOptionDescriptor } from "./option.js";
export type { ProfileType, OverridesTable, ProfileTable, ResolvedConfig } from "./profile.js";
export { PROFILE_TYPES, isProfileType } from "./profile.js";
export type { ServiceEntry, ConflictGroup, CatalogService, ServiceCatalog, PortClaim } from "./service.js";
export type {
  ValidationError, ValidationErrorKind, ValidationReport, ConflictError, DependencyError, CycleError,
  UnknownProfileError, UnknownKeyError, ValueTypeError, BoundsError, AssertionError,
} from "./validation.js";
export type { ComposerConfig } from "./config.js";
export type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "./response.js";
export type { ToolMetadata, RegisteredTool } from "./tool.js";
