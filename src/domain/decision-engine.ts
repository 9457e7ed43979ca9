import { Decimal } from "decimal.js";
import { AppError } from "../infra/app-error.js";
import { isNegativeAmount } from "./money.js";
import type { Decision, TransactionRecord } from "./types.js";

const MS_PER_DAY = 86_400_000;

export const REASON_TIME_BARRED = "dispute filed beyond time-bar window";
export const REASON_AUTO_RESOLVED = "auto-resolved: amount within self-service threshold";
export const REASON_FORWARDED = "forwarded for acquirer investigation; provisional credit issued";

export interface DecisionConfig {
  timeBarredDays: number;
  /** Compared in the transaction's own currency; no conversion is applied. */
  autoResolveAmount: Decimal;
}

export const DEFAULT_DECISION_CONFIG: DecisionConfig = {
  timeBarredDays: 600,
  autoResolveAmount: new Decimal("100.00"),
};

export type DecisionInput = Pick<TransactionRecord, "transaction_id" | "transaction_date" | "amount">;

function invalidTransaction(transactionId: string, message: string): AppError {
  return new AppError(422, "invalid_transaction_state", `Transaction '${transactionId}' ${message}.`);
}

export class DisputeDecisionEngine {
  private readonly config: DecisionConfig;

  constructor(config: Partial<DecisionConfig> = {}) {
    this.config = { ...DEFAULT_DECISION_CONFIG, ...config };
    if (!Number.isInteger(this.config.timeBarredDays) || this.config.timeBarredDays < 0) {
      throw new AppError(500, "invalid_runtime_config", "timeBarredDays must be a non-negative integer.");
    }
    if (!this.config.autoResolveAmount.isFinite() || isNegativeAmount(this.config.autoResolveAmount)) {
      throw new AppError(500, "invalid_runtime_config", "autoResolveAmount must be a non-negative decimal.");
    }
  }

  ageInDays(transaction: DecisionInput, filedAt: string): number {
    const transactionMs = Date.parse(transaction.transaction_date);
    if (!Number.isFinite(transactionMs)) {
      throw invalidTransaction(transaction.transaction_id, "has an unparseable transaction date");
    }
    const filedMs = Date.parse(filedAt);
    if (!Number.isFinite(filedMs)) {
      throw new AppError(422, "validation_failure", `Dispute filing time '${filedAt}' is not a valid timestamp.`);
    }
    const elapsedMs = filedMs - transactionMs;
    if (elapsedMs < 0) {
      throw invalidTransaction(transaction.transaction_id, "is dated after the dispute filing time");
    }
    return Math.floor(elapsedMs / MS_PER_DAY);
  }

  decide(transaction: DecisionInput, filedAt: string): Decision {
    const raw = transaction.amount;
    if (raw === null || !raw.isFinite()) {
      throw invalidTransaction(transaction.transaction_id, "has no amount");
    }
    if (isNegativeAmount(raw)) {
      throw invalidTransaction(transaction.transaction_id, "has a negative amount");
    }
    const amount = raw.isZero() ? new Decimal(0) : raw;

    const ageDays = this.ageInDays(transaction, filedAt);

    if (ageDays > this.config.timeBarredDays) {
      return {
        status: "REJECTED_TIME_BARRED",
        credit_type: "NONE",
        credit_amount: new Decimal(0),
        reason: REASON_TIME_BARRED,
      };
    }

    if (amount.lessThanOrEqualTo(this.config.autoResolveAmount)) {
      return {
        status: "RESOLVED_CUSTOMER",
        credit_type: "PERMANENT",
        credit_amount: amount,
        reason: REASON_AUTO_RESOLVED,
      };
    }

    return {
      status: "FORWARDED_TO_ACQUIRER",
      credit_type: "TEMPORARY",
      credit_amount: amount,
      reason: REASON_FORWARDED,
    };
  }
}
