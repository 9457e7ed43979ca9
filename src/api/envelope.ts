import type { FastifyReply } from "fastify";
import type { CaseResult } from "../application/case-lifecycle.js";
import type { AppError, CaseErrorCode, ErrorCode } from "../infra/app-error.js";

export interface SuccessEnvelope<TData> {
  success: true;
  data: TData;
}

export interface ErrorEnvelope {
  success: false;
  error: ErrorCode;
  message: string;
  existing_case_id?: string;
}

const CASE_ERROR_STATUS: Record<CaseErrorCode, number> = {
  not_found: 404,
  validation_failure: 422,
  invalid_transaction_state: 422,
  invalid_state_transition: 409,
  duplicate_case: 409,
  connectivity_failure: 503,
  throttle_exhausted: 503,
  internal_failure: 500,
};

export function statusForCaseError(code: CaseErrorCode): number {
  return CASE_ERROR_STATUS[code];
}

export function presentResult<TData, TBody>(
  reply: FastifyReply,
  result: CaseResult<TData>,
  successStatus: number,
  present: (data: TData) => TBody,
): FastifyReply {
  if (result.success) {
    const body: SuccessEnvelope<TBody> = { success: true, data: present(result.data) };
    return reply.status(successStatus).send(body);
  }
  const body: ErrorEnvelope = {
    success: false,
    error: result.error,
    message: result.message,
    ...(result.existingCaseId ? { existing_case_id: result.existingCaseId } : {}),
  };
  return reply.status(statusForCaseError(result.error)).send(body);
}

export function presentError(reply: FastifyReply, error: AppError): FastifyReply {
  const body: ErrorEnvelope = {
    success: false,
    error: error.code,
    message: error.message,
    ...(error.details.existingCaseId ? { existing_case_id: error.details.existingCaseId } : {}),
  };
  return reply.status(error.statusCode).send(body);
}
