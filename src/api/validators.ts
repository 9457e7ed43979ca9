import type { ResolutionStatus } from "../application/case-lifecycle.js";
import type { CaseDocumentInput } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export interface FileDisputeInput {
  customer_id: string;
  transaction_id: string;
  filed_at?: string;
}

export interface AttachDocumentsInput {
  documents: CaseDocumentInput[];
}

export interface ResolveCaseInput {
  status: ResolutionStatus;
  reason: string;
}

const resolutionStatuses: readonly ResolutionStatus[] = ["RESOLVED_ACQUIRER", "RESOLVED_CUSTOMER", "CLOSED"];

export function assertFileDisputeInput(payload: unknown): asserts payload is FileDisputeInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  if (!isString(payload.customer_id)) {
    throw new AppError(422, "validation_failure", "customer_id is required.");
  }
  if (!isString(payload.transaction_id)) {
    throw new AppError(422, "validation_failure", "transaction_id is required.");
  }
  if (payload.filed_at !== undefined) {
    if (!isString(payload.filed_at) || !Number.isFinite(Date.parse(payload.filed_at))) {
      throw new AppError(422, "validation_failure", "filed_at must be a valid ISO-8601 date-time.");
    }
  }
}

export function assertAttachDocumentsInput(payload: unknown): asserts payload is AttachDocumentsInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  if (!Array.isArray(payload.documents) || payload.documents.length === 0) {
    throw new AppError(422, "validation_failure", "documents must be a non-empty array.");
  }
  for (const [index, document] of payload.documents.entries()) {
    if (
      !isObject(document)
      || !isString(document.filename)
      || !isString(document.storage_key)
      || !isString(document.url)
    ) {
      throw new AppError(
        422,
        "validation_failure",
        `documents[${index}] requires filename, storage_key, and url.`,
      );
    }
  }
}

export function assertResolveCaseInput(payload: unknown): asserts payload is ResolveCaseInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  const { status } = payload;
  if (typeof status !== "string" || !resolutionStatuses.some((allowed) => allowed === status)) {
    throw new AppError(
      422,
      "validation_failure",
      `status must be one of: ${resolutionStatuses.join(", ")}.`,
    );
  }
  if (!isString(payload.reason)) {
    throw new AppError(422, "validation_failure", "reason is required.");
  }
}

export function normalizeLimit(value: unknown, fallback = 50, max = 200): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = typeof value === "string" ? Number(value) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new AppError(422, "validation_failure", "limit must be a positive integer.");
  }
  return Math.min(parsed, max);
}

export function normalizeResourceId(value: unknown, fieldName: string): string {
  if (typeof value !== "string") {
    throw new AppError(400, "invalid_path_parameter", `${fieldName} must be a string.`);
  }
  const normalized = value.trim();
  if (normalized.length === 0 || normalized.length > 255) {
    throw new AppError(
      400,
      "invalid_path_parameter",
      `${fieldName} length must be between 1 and 255 characters.`,
    );
  }
  return normalized;
}
