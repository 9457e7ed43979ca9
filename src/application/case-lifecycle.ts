import { randomUUID } from "node:crypto";
import { Decimal } from "decimal.js";
import type { DisputeDecisionEngine } from "../domain/decision-engine.js";
import { assertTransition, openStatuses } from "../domain/state-machine.js";
import {
  DISPUTE_STATUSES,
  type CaseDocument,
  type CaseDocumentInput,
  type CaseRecord,
  type CustomerRecord,
  type DisputeStatus,
} from "../domain/types.js";
import { AppError, isCaseErrorCode, type CaseErrorCode } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { KeyedMutex } from "../infra/keyed-mutex.js";
import type { LoggerPort } from "../infra/logger.js";
import { maskCustomerId } from "../infra/mask.js";
import type { DuplicateGuard } from "./duplicate-guard.js";
import { type CaseStatusUpdate, PersistenceGateway } from "./persistence-gateway.js";

export type CaseResult<TData> =
  | { success: true; data: TData }
  | { success: false; error: CaseErrorCode; message: string; existingCaseId?: string };

export type ResolutionStatus = Exclude<DisputeStatus, "FORWARDED_TO_ACQUIRER" | "REJECTED_TIME_BARRED">;

export interface LifecycleObserver {
  caseFiled?(record: CaseRecord): void;
  duplicateRejected?(transactionId: string): void;
  caseResolved?(record: CaseRecord): void;
}

export interface CaseLifecycleOptions {
  /** When false every earlier case for the transaction blocks a new filing. */
  allowRefileAfterTerminal: boolean;
  defaultListLimit: number;
  maxListLimit: number;
  observer?: LifecycleObserver;
  mutex?: KeyedMutex;
}

const DEFAULT_OPTIONS: CaseLifecycleOptions = {
  allowRefileAfterTerminal: false,
  defaultListLimit: 50,
  maxListLimit: 200,
};

export const DUPLICATE_CASE_MESSAGE = "case already exists";

function fail<TData>(error: CaseErrorCode, message: string, existingCaseId?: string): CaseResult<TData> {
  return {
    success: false,
    error,
    message,
    ...(existingCaseId ? { existingCaseId } : {}),
  };
}

/** Stored timestamps are UTC ISO strings so that they order lexically. */
function normalizeTimestamp(value: string, field: string): string {
  const parsed = Date.parse(value);
  if (!Number.isFinite(parsed)) {
    throw new AppError(422, "validation_failure", `${field} must be a valid ISO-8601 date-time.`);
  }
  return new Date(parsed).toISOString();
}

function requireText(value: string, field: string): void {
  if (value.trim().length === 0) {
    throw new AppError(422, "validation_failure", `${field} must be a non-empty string.`);
  }
}

/**
 * Entry point for the presentation layer. Nothing thrown below this class
 * escapes it: every failure is returned as a CaseResult.
 */
export class CaseLifecycleManager {
  private readonly options: CaseLifecycleOptions;
  private readonly mutex: KeyedMutex;

  constructor(
    private readonly gateway: PersistenceGateway,
    private readonly guard: DuplicateGuard,
    private readonly engine: DisputeDecisionEngine,
    private readonly clock: ClockPort,
    private readonly logger: LoggerPort,
    options: Partial<CaseLifecycleOptions> = {},
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    this.mutex = this.options.mutex ?? new KeyedMutex();
  }

  async fileDispute(customerId: string, transactionId: string, filedAt?: string): Promise<CaseResult<CaseRecord>> {
    return this.capture("file_dispute", () =>
      this.mutex.runExclusive(transactionId, async () => {
        const filedAtIso = normalizeTimestamp(filedAt ?? this.clock.nowIso(), "filed_at");
        const transaction = await this.gateway.getTransaction(transactionId);
        if (transaction.customer_id !== customerId) {
          throw new AppError(
            422,
            "invalid_transaction_state",
            `Transaction '${transactionId}' does not belong to the given customer.`,
          );
        }

        const blocking = await this.guard.findBlockingCase(
          transactionId,
          this.options.allowRefileAfterTerminal ? "open" : "any",
        );
        if (blocking) {
          this.options.observer?.duplicateRejected?.(transactionId);
          return fail<CaseRecord>("duplicate_case", DUPLICATE_CASE_MESSAGE, blocking.case_id);
        }

        const decision = this.engine.decide(transaction, filedAtIso);
        // The amount was validated by the decision engine.
        const transactionAmount = transaction.amount ?? new Decimal(0);
        const record: CaseRecord = {
          case_id: `case_${randomUUID()}`,
          customer_id: customerId,
          card_id: transaction.card_number,
          transaction_id: transactionId,
          transaction_date: transaction.transaction_date,
          transaction_amount: transactionAmount,
          currency: transaction.currency,
          merchant: transaction.merchant,
          dispute_status: decision.status,
          decision_reason: decision.reason,
          credit_type: decision.credit_type,
          credit_amount: decision.credit_amount,
          auto_decided: true,
          requires_manual_review: decision.status === "FORWARDED_TO_ACQUIRER",
          documents: [],
          created_at: filedAtIso,
          updated_at: filedAtIso,
        };

        try {
          const created = await this.gateway.createCase(record, this.blockingStatuses());
          this.options.observer?.caseFiled?.(created);
          this.logger.info(
            {
              case_id: created.case_id,
              customer: maskCustomerId(customerId),
              status: created.dispute_status,
              credit_type: created.credit_type,
            },
            "dispute filed",
          );
          return { success: true, data: created };
        } catch (error) {
          if (error instanceof AppError && error.code === "duplicate_case") {
            this.options.observer?.duplicateRejected?.(transactionId);
            return fail<CaseRecord>("duplicate_case", DUPLICATE_CASE_MESSAGE, error.details.existingCaseId);
          }
          throw error;
        }
      }),
    );
  }

  async getCase(caseId: string): Promise<CaseResult<CaseRecord>> {
    return this.capture("get_case", async () => ({ success: true, data: await this.gateway.getCase(caseId) }));
  }

  async getCasesForCustomer(customerId: string, limit?: number): Promise<CaseResult<CaseRecord[]>> {
    return this.capture("get_cases_for_customer", async () => {
      const effectiveLimit = limit ?? this.options.defaultListLimit;
      if (!Number.isInteger(effectiveLimit) || effectiveLimit < 1 || effectiveLimit > this.options.maxListLimit) {
        throw new AppError(
          422,
          "validation_failure",
          `limit must be an integer between 1 and ${this.options.maxListLimit}.`,
        );
      }
      const cases = await this.gateway.listCasesForCustomer(customerId, effectiveLimit);
      return { success: true, data: cases };
    });
  }

  async getCustomer(customerId: string): Promise<CaseResult<CustomerRecord>> {
    return this.capture("get_customer", async () => ({
      success: true,
      data: await this.gateway.getCustomer(customerId),
    }));
  }

  async attachDocuments(caseId: string, documents: CaseDocumentInput[]): Promise<CaseResult<CaseRecord>> {
    return this.capture("attach_documents", async () => {
      if (documents.length === 0) {
        throw new AppError(422, "validation_failure", "At least one document is required.");
      }
      for (const [index, document] of documents.entries()) {
        requireText(document.filename, `documents[${index}].filename`);
        requireText(document.storage_key, `documents[${index}].storage_key`);
        requireText(document.url, `documents[${index}].url`);
      }
      const attachedAt = this.clock.nowIso();
      const stamped: CaseDocument[] = documents.map((document) => ({
        filename: document.filename,
        storage_key: document.storage_key,
        url: document.url,
        attached_at: attachedAt,
      }));
      const updated = await this.gateway.updateCaseDocuments(caseId, stamped, attachedAt);
      return { success: true, data: updated };
    });
  }

  async resolveCase(caseId: string, status: ResolutionStatus, reason: string): Promise<CaseResult<CaseRecord>> {
    return this.capture("resolve_case", async () => {
      requireText(reason, "reason");
      const current = await this.gateway.getCase(caseId);
      assertTransition(current.dispute_status, status);

      const update: CaseStatusUpdate = {
        dispute_status: status,
        decision_reason: reason,
        credit_type: current.credit_type,
        credit_amount: current.credit_amount,
        requires_manual_review: false,
        updated_at: this.clock.nowIso(),
      };
      if (status === "RESOLVED_CUSTOMER") {
        update.credit_type = "PERMANENT";
      } else if (status === "RESOLVED_ACQUIRER") {
        update.credit_type = "NONE";
        update.credit_amount = new Decimal(0);
      }

      const updated = await this.gateway.transitionCase(caseId, current.dispute_status, update);
      this.options.observer?.caseResolved?.(updated);
      this.logger.info({ case_id: caseId, from: current.dispute_status, to: status }, "case resolved");
      return { success: true, data: updated };
    });
  }

  private blockingStatuses(): readonly DisputeStatus[] {
    if (this.options.allowRefileAfterTerminal) {
      return openStatuses();
    }
    return DISPUTE_STATUSES;
  }

  private async capture<TData>(operation: string, run: () => Promise<CaseResult<TData>>): Promise<CaseResult<TData>> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof AppError && isCaseErrorCode(error.code)) {
        return fail<TData>(error.code, error.message, error.details.existingCaseId);
      }
      if (error instanceof AppError) {
        return fail<TData>("validation_failure", error.message);
      }
      this.logger.error({ err: error, operation }, "unexpected failure in case lifecycle");
      return fail<TData>("internal_failure", "Unexpected error while processing the request.");
    }
  }
}
