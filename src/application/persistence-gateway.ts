import type { Decimal } from "decimal.js";
import { isTerminalStatus } from "../domain/state-machine.js";
import { parseDecimal, toDecimalString } from "../domain/money.js";
import type {
  CardRecord,
  CaseDocument,
  CaseRecord,
  CreditType,
  CustomerRecord,
  DisputeStatus,
  TransactionRecord,
} from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { LoggerPort } from "../infra/logger.js";
import { maskCustomerId } from "../infra/mask.js";
import type { AccountStorePort, StoredAccountRow } from "../ports/account-store.js";
import type { CaseStorePort, StoredCaseItem } from "../ports/case-store.js";
import { StoreError } from "../ports/store-error.js";
import type { RetryPolicy } from "./retry-policy.js";

export interface CaseStatusUpdate {
  dispute_status: DisputeStatus;
  decision_reason: string;
  credit_type: CreditType;
  credit_amount: Decimal;
  requires_manual_review: boolean;
  updated_at: string;
}

function translateStoreError(error: unknown, operation: string): unknown {
  if (!(error instanceof StoreError)) {
    return error;
  }
  switch (error.kind) {
    case "not_found":
      return new AppError(404, "not_found", error.message);
    case "validation":
      return new AppError(422, "validation_failure", `Store rejected '${operation}': ${error.message}`);
    case "conditional_check_failed":
      return new AppError(409, "duplicate_case", error.message, {
        ...(error.existingCaseId ? { existingCaseId: error.existingCaseId } : {}),
      });
    case "connectivity":
      return new AppError(503, "connectivity_failure", `Store unreachable during '${operation}': ${error.message}`);
    case "throttled":
      return new AppError(503, "throttle_exhausted", `Store throttled '${operation}': ${error.message}`);
  }
}

function requireDecimalString(value: Decimal | number, field: string): string {
  const serialized = toDecimalString(value);
  if (serialized === null) {
    throw new AppError(422, "validation_failure", `Field '${field}' cannot be stored as an exact decimal.`);
  }
  return serialized;
}

function readDecimal(value: string, field: string, caseId: string): Decimal {
  const parsed = parseDecimal(value);
  if (!parsed) {
    throw new AppError(422, "validation_failure", `Stored case '${caseId}' has a malformed '${field}'.`);
  }
  return parsed;
}

export function toStoredCaseItem(record: CaseRecord): StoredCaseItem {
  const creditAmount = requireDecimalString(record.credit_amount, "credit_amount");
  if (creditAmount.startsWith("-")) {
    throw new AppError(422, "validation_failure", "Field 'credit_amount' must not be negative.");
  }
  return {
    case_id: record.case_id,
    customer_id: record.customer_id,
    card_id: record.card_id,
    transaction_id: record.transaction_id,
    transaction_date: record.transaction_date,
    transaction_amount: requireDecimalString(record.transaction_amount, "transaction_amount"),
    currency: record.currency,
    merchant: record.merchant,
    dispute_status: record.dispute_status,
    decision_reason: record.decision_reason,
    credit_type: record.credit_type,
    credit_amount: creditAmount,
    auto_decided: record.auto_decided,
    requires_manual_review: record.requires_manual_review,
    documents: record.documents.map((document) => ({ ...document })),
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
}

export function fromStoredCaseItem(item: StoredCaseItem): CaseRecord {
  return {
    ...item,
    transaction_amount: readDecimal(item.transaction_amount, "transaction_amount", item.case_id),
    credit_amount: readDecimal(item.credit_amount, "credit_amount", item.case_id),
    documents: item.documents.map((document) => ({ ...document })),
  };
}

function toTransaction(row: StoredAccountRow): TransactionRecord | null {
  if (!row.transaction_id) {
    return null;
  }
  return {
    transaction_id: row.transaction_id,
    customer_id: row.customer_id,
    card_number: row.card_number,
    amount: row.amount === null ? null : parseDecimal(row.amount),
    currency: row.currency,
    transaction_date: row.transaction_date ?? "",
    merchant: row.merchant,
    description: row.description,
    status: row.status,
  };
}

/**
 * Sole reader and writer of durable state. Every store call runs through the
 * retry policy; store failures leave this class as AppError.
 */
export class PersistenceGateway {
  constructor(
    private readonly accounts: AccountStorePort,
    private readonly cases: CaseStorePort,
    private readonly retry: RetryPolicy,
    private readonly logger: LoggerPort,
  ) {}

  async getCustomer(customerId: string): Promise<CustomerRecord> {
    const rows = await this.call("get_customer", () => this.accounts.queryByCustomer(customerId));
    const first = rows[0];
    if (!first) {
      throw new AppError(404, "not_found", `Customer '${customerId}' not found.`);
    }

    const cards = new Map<string, CardRecord>();
    for (const row of rows) {
      const card =
        cards.get(row.card_number) ?? {
          card_number: row.card_number,
          card_type: row.card_type,
          card_status: row.card_status,
          expiry_date: row.expiry_date,
          transactions: [],
        };
      cards.set(row.card_number, card);
      const transaction = toTransaction(row);
      if (transaction) {
        card.transactions.push(transaction);
      }
    }

    this.logger.debug(
      { customer: maskCustomerId(customerId), cards: cards.size },
      "customer loaded",
    );
    return {
      customer_id: customerId,
      cardholder_name: first.cardholder_name,
      cards: [...cards.values()],
    };
  }

  async getTransaction(transactionId: string): Promise<TransactionRecord> {
    const row = await this.call("get_transaction", () => this.accounts.getByTransaction(transactionId));
    const transaction = row ? toTransaction(row) : null;
    if (!transaction) {
      throw new AppError(404, "not_found", `Transaction '${transactionId}' not found.`);
    }
    return transaction;
  }

  async listCasesForTransaction(transactionId: string): Promise<CaseRecord[]> {
    const items = await this.call("list_cases_for_transaction", () => this.cases.queryByTransaction(transactionId));
    return items.map(fromStoredCaseItem);
  }

  async getOpenCaseForTransaction(transactionId: string): Promise<CaseRecord | null> {
    const cases = await this.listCasesForTransaction(transactionId);
    return cases.find((item) => !isTerminalStatus(item.dispute_status)) ?? null;
  }

  async createCase(record: CaseRecord, blockingStatuses: readonly DisputeStatus[]): Promise<CaseRecord> {
    const item = toStoredCaseItem(record);
    await this.call("create_case", () => this.cases.insertCase(item, { blockingStatuses }));
    this.logger.info(
      { case_id: item.case_id, transaction_id: item.transaction_id, status: item.dispute_status },
      "case created",
    );
    return fromStoredCaseItem(item);
  }

  async getCase(caseId: string): Promise<CaseRecord> {
    const item = await this.call("get_case", () => this.cases.getCase(caseId));
    if (!item) {
      throw new AppError(404, "not_found", `Case '${caseId}' not found.`);
    }
    return fromStoredCaseItem(item);
  }

  async listCasesForCustomer(customerId: string, limit: number): Promise<CaseRecord[]> {
    const items = await this.call("list_cases_for_customer", () => this.cases.queryByCustomer(customerId, limit));
    return items.map(fromStoredCaseItem);
  }

  async updateCaseDocuments(caseId: string, documents: CaseDocument[], updatedAt: string): Promise<CaseRecord> {
    const item = await this.call("update_case_documents", () =>
      this.cases.appendDocuments(caseId, documents.map((document) => ({ ...document })), updatedAt),
    );
    this.logger.info({ case_id: caseId, added: documents.length }, "case documents attached");
    return fromStoredCaseItem(item);
  }

  async transitionCase(caseId: string, expectedStatus: DisputeStatus, update: CaseStatusUpdate): Promise<CaseRecord> {
    const change = {
      ...update,
      credit_amount: requireDecimalString(update.credit_amount, "credit_amount"),
    };
    try {
      const item = await this.call("transition_case", () => this.cases.updateStatus(caseId, expectedStatus, change));
      return fromStoredCaseItem(item);
    } catch (error) {
      if (error instanceof AppError && error.code === "duplicate_case") {
        throw new AppError(409, "invalid_state_transition", `Case '${caseId}' changed status concurrently.`);
      }
      throw error;
    }
  }

  async ping(): Promise<void> {
    await this.call("ping_accounts", () => this.accounts.ping());
    await this.call("ping_cases", () => this.cases.ping());
  }

  private async call<TOutput>(operation: string, run: () => Promise<TOutput>): Promise<TOutput> {
    try {
      return await this.retry.execute(operation, run);
    } catch (error) {
      const translated = translateStoreError(error, operation);
      if (translated instanceof AppError && translated.statusCode >= 500) {
        this.logger.error({ operation, code: translated.code }, translated.message);
      }
      throw translated;
    }
  }
}
