import type { ToolContext } from "./context.js";
import type { ToolResponse, SuccessResponse, ErrorResponse, ErrorCategory } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import type { ValidationError } from "../types/validation.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, durationMs: number | null, data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, duration_ms: durationMs, data, ...extra };
}

export function error(tool: string, durationMs: number | null, opts: {
  code: string;
  category: ErrorCategory;
  message: string;
  validationErrors?: ValidationError[];
  remediation?: string[];
}): ErrorResponse {
  return {
    status: "error", tool, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    ...(opts.validationErrors ? { validation_errors: opts.validationErrors } : {}),
    remediation: opts.remediation ?? [],
  };
}

// ── Validation failures ────────────────────────────────────────────

const REMEDIATION: Record<ValidationError["kind"], string> = {
  conflict: "Disable one of the conflicting services or move it to a free port",
  dependency: "Enable the missing service or disable the service that needs it",
  cycle: "Break the dependency cycle between the listed services",
  unknown_profile: "Run cfg_list_profiles to see the registered profiles",
  unknown_key: "Check the override path against cfg_option_docs",
  type: "Run cfg_check_option on the path to see the expected value",
  bounds: "Pick a value inside the declared range",
  assertion: "Adjust the related options so the constraint holds",
};

/** Error response for a list of configuration problems; remediation is one hint per distinct kind. */
export function validationFailure(tool: string, durationMs: number | null, errors: ValidationError[]): ErrorResponse {
  const kinds = [...new Set(errors.map((e) => e.kind))];
  const onlyProfile = kinds.length === 1 && kinds[0] === "unknown_profile";
  return error(tool, durationMs, {
    code: onlyProfile ? "UNKNOWN_PROFILE" : "VALIDATION_FAILED",
    category: onlyProfile ? "not_found" : "validation",
    message: errors.length === 1 && errors[0] ? errors[0].message : `${errors.length} configuration problems found`,
    validationErrors: errors,
    remediation: kinds.map((k) => REMEDIATION[k]),
  });
}

// ── Tool Registration Helper ───────────────────────────────────────

/** Register a tool on the context's registry with less boilerplate. */
export function registerTool(
  ctx: ToolContext,
  metadata: ToolMetadata,
  handler: (args: Record<string, unknown>) => Promise<ToolResponse>,
): void {
  ctx.registry.register({ metadata, execute: handler });
}
