import type { Decimal } from "decimal.js";

export type DisputeStatus =
  | "REJECTED_TIME_BARRED"
  | "RESOLVED_CUSTOMER"
  | "FORWARDED_TO_ACQUIRER"
  | "RESOLVED_ACQUIRER"
  | "CLOSED";

export const DISPUTE_STATUSES: readonly DisputeStatus[] = [
  "REJECTED_TIME_BARRED",
  "RESOLVED_CUSTOMER",
  "FORWARDED_TO_ACQUIRER",
  "RESOLVED_ACQUIRER",
  "CLOSED",
];

export type CreditType = "NONE" | "TEMPORARY" | "PERMANENT";

export interface TransactionRecord {
  transaction_id: string;
  customer_id: string;
  card_number: string;
  amount: Decimal | null;
  currency: string | null;
  transaction_date: string;
  merchant: string | null;
  description: string | null;
  status: string | null;
}

export interface CardRecord {
  card_number: string;
  card_type: string | null;
  card_status: string | null;
  expiry_date: string | null;
  transactions: TransactionRecord[];
}

export interface CustomerRecord {
  customer_id: string;
  cardholder_name: string | null;
  cards: CardRecord[];
}

export interface CaseDocument {
  filename: string;
  storage_key: string;
  url: string;
  attached_at: string;
}

export type CaseDocumentInput = Omit<CaseDocument, "attached_at">;

export interface CaseRecord {
  case_id: string;
  customer_id: string;
  card_id: string;
  transaction_id: string;
  transaction_date: string;
  transaction_amount: Decimal;
  currency: string | null;
  merchant: string | null;
  dispute_status: DisputeStatus;
  decision_reason: string;
  credit_type: CreditType;
  credit_amount: Decimal;
  auto_decided: boolean;
  requires_manual_review: boolean;
  documents: CaseDocument[];
  created_at: string;
  updated_at: string;
}

export interface Decision {
  status: DisputeStatus;
  credit_type: CreditType;
  credit_amount: Decimal;
  reason: string;
}

export interface TransactionResponse {
  transaction_id: string;
  amount: string | null;
  currency: string | null;
  transaction_date: string;
  merchant: string | null;
  description: string | null;
  status: string | null;
}

export interface CardResponse {
  card_number: string;
  card_type: string | null;
  card_status: string | null;
  expiry_date: string | null;
  transactions: TransactionResponse[];
}

export interface CustomerResponse {
  customer_id: string;
  cardholder_name: string | null;
  cards: CardResponse[];
}

export interface CaseResponse {
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
  credit_issued: boolean;
  auto_decided: boolean;
  requires_manual_review: boolean;
  documents: CaseDocument[];
  created_at: string;
  updated_at: string;
}
