import type { Pool } from "pg";
import type { AccountStorePort, StoredAccountRow } from "../../ports/account-store.js";
import { classifyPostgresError, mapOptionalDecimal, mapOptionalTimestamp } from "./store-errors.js";

interface AccountRow {
  customer_id: string;
  cardholder_name: string | null;
  card_number: string;
  card_type: string | null;
  card_status: string | null;
  expiry_date: string | null;
  transaction_id: string | null;
  amount: unknown;
  currency: string | null;
  transaction_date: unknown;
  merchant: string | null;
  description: string | null;
  status: string | null;
}

const ACCOUNT_COLUMNS = `
  c.customer_id,
  c.cardholder_name,
  k.card_number,
  k.card_type,
  k.card_status,
  k.expiry_date,
  t.transaction_id,
  t.amount,
  t.currency,
  t.transaction_date,
  t.merchant,
  t.description,
  t.status
`;

function mapRow(row: AccountRow): StoredAccountRow {
  return {
    customer_id: row.customer_id,
    cardholder_name: row.cardholder_name,
    card_number: row.card_number,
    card_type: row.card_type,
    card_status: row.card_status,
    expiry_date: row.expiry_date,
    transaction_id: row.transaction_id,
    amount: mapOptionalDecimal(row.amount, "amount"),
    currency: row.currency,
    transaction_date: mapOptionalTimestamp(row.transaction_date),
    merchant: row.merchant,
    description: row.description,
    status: row.status,
  };
}

export class PostgresAccountStore implements AccountStorePort {
  constructor(private readonly pool: Pool) {}

  async queryByCustomer(customerId: string): Promise<StoredAccountRow[]> {
    try {
      const result = await this.pool.query<AccountRow>(
        `
          SELECT ${ACCOUNT_COLUMNS}
          FROM dsp_customers c
          JOIN dsp_cards k ON k.customer_id = c.customer_id
          LEFT JOIN dsp_transactions t ON t.card_number = k.card_number
          WHERE c.customer_id = $1
          ORDER BY k.card_number ASC, t.transaction_date DESC NULLS LAST
        `,
        [customerId],
      );
      return result.rows.map(mapRow);
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }

  async getByTransaction(transactionId: string): Promise<StoredAccountRow | null> {
    try {
      const result = await this.pool.query<AccountRow>(
        `
          SELECT ${ACCOUNT_COLUMNS}
          FROM dsp_transactions t
          JOIN dsp_cards k ON k.card_number = t.card_number
          JOIN dsp_customers c ON c.customer_id = k.customer_id
          WHERE t.transaction_id = $1
        `,
        [transactionId],
      );
      const row = result.rows[0];
      return row ? mapRow(row) : null;
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }

  async ping(): Promise<void> {
    try {
      await this.pool.query("SELECT 1");
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }
}
