/**
 * One row per card and transaction. A card without transactions is returned as
 * a single row with a null transaction_id.
 */
export interface StoredAccountRow {
  customer_id: string;
  cardholder_name: string | null;
  card_number: string;
  card_type: string | null;
  card_status: string | null;
  expiry_date: string | null;
  transaction_id: string | null;
  amount: string | null;
  currency: string | null;
  transaction_date: string | null;
  merchant: string | null;
  description: string | null;
  status: string | null;
}

export interface AccountStorePort {
  queryByCustomer(customerId: string): Promise<StoredAccountRow[]>;
  getByTransaction(transactionId: string): Promise<StoredAccountRow | null>;
  ping(): Promise<void>;
}
