import type { ValidationError } from "./validation.js";

/** Error categories reported to the client. */
export type ErrorCategory = "validation" | "not_found" | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error";
  tool: string;
  /** null when the tool did no measurable work. */
  duration_ms: number | null;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  summary?: string;
  total?: number;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  // Structured configuration problems, when the failure came from validation
  validation_errors?: ValidationError[];
  remediation: string[];
}

export type ToolResponse = SuccessResponse | ErrorResponse;
