import type { CreditType, DisputeStatus } from "../domain/types.js";

export interface StoredCaseDocument {
  filename: string;
  storage_key: string;
  url: string;
  attached_at: string;
}

/** Numeric fields travel as plain decimal strings; stores reject anything else. */
export interface StoredCaseItem {
  case_id: string;
  customer_id: string;
  card_id: string;
  transaction_id: string;
  transaction_date: string;
  transaction_amount: string;
  currency: string | null;
  merchant: string | null;
  dispute_status: DisputeStatus;
  decision_reason: string;
  credit_type: CreditType;
  credit_amount: string;
  auto_decided: boolean;
  requires_manual_review: boolean;
  documents: StoredCaseDocument[];
  created_at: string;
  updated_at: string;
}

export interface InsertCaseCondition {
  /** The insert fails if any case for the same transaction is in one of these statuses. */
  blockingStatuses: readonly DisputeStatus[];
}

export interface CaseStatusChange {
  dispute_status: DisputeStatus;
  decision_reason: string;
  credit_type: CreditType;
  credit_amount: string;
  requires_manual_review: boolean;
  updated_at: string;
}

export interface CaseStorePort {
  /** Throws StoreError("conditional_check_failed") carrying the blocking case id. */
  insertCase(item: StoredCaseItem, condition: InsertCaseCondition): Promise<void>;
  getCase(caseId: string): Promise<StoredCaseItem | null>;
  /** Latest first. */
  queryByTransaction(transactionId: string): Promise<StoredCaseItem[]>;
  /** Latest first, at most `limit` items. */
  queryByCustomer(customerId: string, limit: number): Promise<StoredCaseItem[]>;
  /** Throws StoreError("not_found") when the case does not exist. */
  appendDocuments(caseId: string, documents: StoredCaseDocument[], updatedAt: string): Promise<StoredCaseItem>;
  /**
   * Applies the change only while the case is still in `expectedStatus`;
   * throws StoreError("conditional_check_failed") otherwise.
   */
  updateStatus(caseId: string, expectedStatus: DisputeStatus, change: CaseStatusChange): Promise<StoredCaseItem>;
  ping(): Promise<void>;
}
