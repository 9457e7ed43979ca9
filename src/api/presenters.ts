import { formatAmount } from "../domain/money.js";
import type {
  CaseRecord,
  CaseResponse,
  CustomerRecord,
  CustomerResponse,
  TransactionRecord,
  TransactionResponse,
} from "../domain/types.js";
import { maskCardNumber } from "../infra/mask.js";

function toTransactionResponse(transaction: TransactionRecord): TransactionResponse {
  return {
    transaction_id: transaction.transaction_id,
    amount: transaction.amount ? formatAmount(transaction.amount) : null,
    currency: transaction.currency,
    transaction_date: transaction.transaction_date,
    merchant: transaction.merchant,
    description: transaction.description,
    status: transaction.status,
  };
}

/** Card numbers never leave the service unmasked. */
export function toCustomerResponse(customer: CustomerRecord): CustomerResponse {
  return {
    customer_id: customer.customer_id,
    cardholder_name: customer.cardholder_name,
    cards: customer.cards.map((card) => ({
      card_number: maskCardNumber(card.card_number),
      card_type: card.card_type,
      card_status: card.card_status,
      expiry_date: card.expiry_date,
      transactions: card.transactions.map(toTransactionResponse),
    })),
  };
}

export function toCaseResponse(record: CaseRecord): CaseResponse {
  return {
    case_id: record.case_id,
    customer_id: record.customer_id,
    card_id: maskCardNumber(record.card_id),
    transaction_id: record.transaction_id,
    transaction_date: record.transaction_date,
    transaction_amount: formatAmount(record.transaction_amount),
    currency: record.currency,
    merchant: record.merchant,
    dispute_status: record.dispute_status,
    decision_reason: record.decision_reason,
    credit_type: record.credit_type,
    credit_amount: formatAmount(record.credit_amount),
    credit_issued: record.credit_type !== "NONE" && record.credit_amount.greaterThan(0),
    auto_decided: record.auto_decided,
    requires_manual_review: record.requires_manual_review,
    documents: record.documents.map((document) => ({ ...document })),
    created_at: record.created_at,
    updated_at: record.updated_at,
  };
}
