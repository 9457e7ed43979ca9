export type CaseErrorCode =
  | "not_found"
  | "validation_failure"
  | "invalid_transaction_state"
  | "invalid_state_transition"
  | "duplicate_case"
  | "connectivity_failure"
  | "throttle_exhausted"
  | "internal_failure";

export type HttpErrorCode =
  | "missing_api_key"
  | "invalid_api_key"
  | "invalid_request_body"
  | "invalid_path_parameter"
  | "invalid_runtime_config"
  | "resource_not_found";

export type ErrorCode = CaseErrorCode | HttpErrorCode;

export interface AppErrorDetails {
  existingCaseId?: string;
}

export class AppError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: ErrorCode,
    message: string,
    readonly details: AppErrorDetails = {},
  ) {
    super(message);
    this.name = "AppError";
  }
}

const CASE_ERROR_CODES: ReadonlySet<string> = new Set<CaseErrorCode>([
  "not_found",
  "validation_failure",
  "invalid_transaction_state",
  "invalid_state_transition",
  "duplicate_case",
  "connectivity_failure",
  "throttle_exhausted",
  "internal_failure",
]);

export function isCaseErrorCode(code: string): code is CaseErrorCode {
  return CASE_ERROR_CODES.has(code);
}
