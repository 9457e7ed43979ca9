import type { DisputeStatus } from "../../domain/types.js";
import { isDecimalString } from "../../domain/money.js";
import type {
  CaseStatusChange,
  CaseStorePort,
  InsertCaseCondition,
  StoredCaseDocument,
  StoredCaseItem,
} from "../../ports/case-store.js";
import { StoreError } from "../../ports/store-error.js";

function assertDecimalField(field: string, value: unknown): void {
  if (typeof value !== "string" || !isDecimalString(value)) {
    throw new StoreError("validation", `Field '${field}' must be a decimal string.`);
  }
}

function newestFirst(a: StoredCaseItem, b: StoredCaseItem): number {
  return b.created_at.localeCompare(a.created_at) || b.case_id.localeCompare(a.case_id);
}

export class InMemoryCaseStore implements CaseStorePort {
  private readonly cases = new Map<string, StoredCaseItem>();

  async insertCase(item: StoredCaseItem, condition: InsertCaseCondition): Promise<void> {
    assertDecimalField("transaction_amount", item.transaction_amount);
    assertDecimalField("credit_amount", item.credit_amount);
    if (this.cases.has(item.case_id)) {
      throw new StoreError("validation", `Case id '${item.case_id}' is already taken.`);
    }
    const blocking = this.findByTransaction(item.transaction_id).find((existing) =>
      condition.blockingStatuses.includes(existing.dispute_status),
    );
    if (blocking) {
      throw new StoreError(
        "conditional_check_failed",
        `Transaction '${item.transaction_id}' already has case '${blocking.case_id}'.`,
        blocking.case_id,
      );
    }
    this.cases.set(item.case_id, structuredClone(item));
  }

  async getCase(caseId: string): Promise<StoredCaseItem | null> {
    const item = this.cases.get(caseId);
    return item ? structuredClone(item) : null;
  }

  async queryByTransaction(transactionId: string): Promise<StoredCaseItem[]> {
    return this.findByTransaction(transactionId).map((item) => structuredClone(item));
  }

  async queryByCustomer(customerId: string, limit: number): Promise<StoredCaseItem[]> {
    return [...this.cases.values()]
      .filter((item) => item.customer_id === customerId)
      .sort(newestFirst)
      .slice(0, Math.max(1, limit))
      .map((item) => structuredClone(item));
  }

  async appendDocuments(
    caseId: string,
    documents: StoredCaseDocument[],
    updatedAt: string,
  ): Promise<StoredCaseItem> {
    const item = this.cases.get(caseId);
    if (!item) {
      throw new StoreError("not_found", `Case '${caseId}' not found.`);
    }
    const updated: StoredCaseItem = {
      ...item,
      documents: [...item.documents, ...documents.map((document) => ({ ...document }))],
      updated_at: updatedAt,
    };
    this.cases.set(caseId, updated);
    return structuredClone(updated);
  }

  async updateStatus(
    caseId: string,
    expectedStatus: DisputeStatus,
    change: CaseStatusChange,
  ): Promise<StoredCaseItem> {
    assertDecimalField("credit_amount", change.credit_amount);
    const item = this.cases.get(caseId);
    if (!item) {
      throw new StoreError("not_found", `Case '${caseId}' not found.`);
    }
    if (item.dispute_status !== expectedStatus) {
      throw new StoreError(
        "conditional_check_failed",
        `Case '${caseId}' is in status '${item.dispute_status}', expected '${expectedStatus}'.`,
      );
    }
    const updated: StoredCaseItem = { ...item, ...change };
    this.cases.set(caseId, updated);
    return structuredClone(updated);
  }

  async ping(): Promise<void> {}

  private findByTransaction(transactionId: string): StoredCaseItem[] {
    return [...this.cases.values()].filter((item) => item.transaction_id === transactionId).sort(newestFirst);
  }
}
