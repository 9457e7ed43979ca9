import type { Pool, PoolClient } from "pg";
import type { CreditType, DisputeStatus } from "../../domain/types.js";
import type {
  CaseStatusChange,
  CaseStorePort,
  InsertCaseCondition,
  StoredCaseDocument,
  StoredCaseItem,
} from "../../ports/case-store.js";
import { StoreError } from "../../ports/store-error.js";
import { classifyPostgresError, mapDecimal, mapTimestamp } from "./store-errors.js";

interface CaseRow {
  case_id: string;
  customer_id: string;
  card_id: string;
  transaction_id: string;
  transaction_date: string;
  transaction_amount: unknown;
  currency: string | null;
  merchant: string | null;
  dispute_status: DisputeStatus;
  decision_reason: string;
  credit_type: CreditType;
  credit_amount: unknown;
  auto_decided: boolean;
  requires_manual_review: boolean;
  documents: unknown;
  created_at: unknown;
  updated_at: unknown;
}

const CASE_COLUMNS = `
  case_id,
  customer_id,
  card_id,
  transaction_id,
  transaction_date,
  transaction_amount,
  currency,
  merchant,
  dispute_status,
  decision_reason,
  credit_type,
  credit_amount,
  auto_decided,
  requires_manual_review,
  documents,
  created_at,
  updated_at
`;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mapDocuments(value: unknown, caseId: string): StoredCaseDocument[] {
  if (!Array.isArray(value)) {
    throw new StoreError("validation", `Case '${caseId}' has a malformed documents column.`);
  }
  return value.map((entry: unknown) => {
    if (
      !isRecord(entry)
      || typeof entry.filename !== "string"
      || typeof entry.storage_key !== "string"
      || typeof entry.url !== "string"
      || typeof entry.attached_at !== "string"
    ) {
      throw new StoreError("validation", `Case '${caseId}' has a malformed document entry.`);
    }
    return {
      filename: entry.filename,
      storage_key: entry.storage_key,
      url: entry.url,
      attached_at: entry.attached_at,
    };
  });
}

function mapCaseRow(row: CaseRow): StoredCaseItem {
  return {
    case_id: row.case_id,
    customer_id: row.customer_id,
    card_id: row.card_id,
    transaction_id: row.transaction_id,
    transaction_date: row.transaction_date,
    transaction_amount: mapDecimal(row.transaction_amount, "transaction_amount"),
    currency: row.currency,
    merchant: row.merchant,
    dispute_status: row.dispute_status,
    decision_reason: row.decision_reason,
    credit_type: row.credit_type,
    credit_amount: mapDecimal(row.credit_amount, "credit_amount"),
    auto_decided: row.auto_decided,
    requires_manual_review: row.requires_manual_review,
    documents: mapDocuments(row.documents, row.case_id),
    created_at: mapTimestamp(row.created_at),
    updated_at: mapTimestamp(row.updated_at),
  };
}

/** The part of a pg PoolClient a transaction needs. */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(error?: Error): void;
}

async function rollback(client: TransactionClient): Promise<Error | undefined> {
  try {
    await client.query("ROLLBACK");
    return undefined;
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Runs `run` between BEGIN and COMMIT and releases the client. A failed
 * rollback destroys the client; the error from `run` is the one rethrown.
 */
export async function runInTransaction<TClient extends TransactionClient>(
  client: TClient,
  run: (client: TClient) => Promise<void>,
): Promise<void> {
  try {
    await client.query("BEGIN");
    await run(client);
    await client.query("COMMIT");
  } catch (error) {
    client.release(await rollback(client));
    throw classifyPostgresError(error);
  }
  client.release();
}

export class PostgresCaseStore implements CaseStorePort {
  constructor(private readonly pool: Pool) {}

  /**
   * The existence check and the insert share one transaction holding an
   * advisory lock on the transaction id, so concurrent filings across
   * processes cannot both pass the check.
   */
  async insertCase(item: StoredCaseItem, condition: InsertCaseCondition): Promise<void> {
    await this.inTransaction(async (client) => {
      await client.query("SELECT pg_advisory_xact_lock(hashtext($1))", [item.transaction_id]);
      const blocking = await client.query<{ case_id: string }>(
        `
          SELECT case_id
          FROM dsp_cases
          WHERE transaction_id = $1
            AND dispute_status = ANY($2::text[])
          ORDER BY created_at DESC
          LIMIT 1
        `,
        [item.transaction_id, [...condition.blockingStatuses]],
      );
      const existing = blocking.rows[0];
      if (existing) {
        throw new StoreError(
          "conditional_check_failed",
          `Transaction '${item.transaction_id}' already has case '${existing.case_id}'.`,
          existing.case_id,
        );
      }

      await client.query(
        `
          INSERT INTO dsp_cases (${CASE_COLUMNS})
          VALUES (
            $1, $2, $3, $4, $5,
            $6::numeric,
            $7, $8, $9, $10, $11,
            $12::numeric,
            $13, $14,
            $15::jsonb,
            $16::timestamptz,
            $17::timestamptz
          )
        `,
        [
          item.case_id,
          item.customer_id,
          item.card_id,
          item.transaction_id,
          item.transaction_date,
          item.transaction_amount,
          item.currency,
          item.merchant,
          item.dispute_status,
          item.decision_reason,
          item.credit_type,
          item.credit_amount,
          item.auto_decided,
          item.requires_manual_review,
          JSON.stringify(item.documents),
          item.created_at,
          item.updated_at,
        ],
      );
    });
  }

  async getCase(caseId: string): Promise<StoredCaseItem | null> {
    try {
      const result = await this.pool.query<CaseRow>(
        `SELECT ${CASE_COLUMNS} FROM dsp_cases WHERE case_id = $1`,
        [caseId],
      );
      const row = result.rows[0];
      return row ? mapCaseRow(row) : null;
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }

  async queryByTransaction(transactionId: string): Promise<StoredCaseItem[]> {
    try {
      const result = await this.pool.query<CaseRow>(
        `
          SELECT ${CASE_COLUMNS}
          FROM dsp_cases
          WHERE transaction_id = $1
          ORDER BY created_at DESC, case_id DESC
        `,
        [transactionId],
      );
      return result.rows.map(mapCaseRow);
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }

  async queryByCustomer(customerId: string, limit: number): Promise<StoredCaseItem[]> {
    try {
      const result = await this.pool.query<CaseRow>(
        `
          SELECT ${CASE_COLUMNS}
          FROM dsp_cases
          WHERE customer_id = $1
          ORDER BY created_at DESC, case_id DESC
          LIMIT $2
        `,
        [customerId, limit],
      );
      return result.rows.map(mapCaseRow);
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }

  async appendDocuments(
    caseId: string,
    documents: StoredCaseDocument[],
    updatedAt: string,
  ): Promise<StoredCaseItem> {
    try {
      const result = await this.pool.query<CaseRow>(
        `
          UPDATE dsp_cases
          SET documents = documents || $2::jsonb,
              updated_at = $3::timestamptz
          WHERE case_id = $1
          RETURNING ${CASE_COLUMNS}
        `,
        [caseId, JSON.stringify(documents), updatedAt],
      );
      const row = result.rows[0];
      if (!row) {
        throw new StoreError("not_found", `Case '${caseId}' not found.`);
      }
      return mapCaseRow(row);
    } catch (error) {
      throw classifyPostgresError(error);
    }
  }

  async updateStatus(
    caseId: string,
    expectedStatus: DisputeStatus,
    change: CaseStatusChange,
  ): Promise<StoredCaseItem> {
    try {
      const result = await this.pool.query<CaseRow>(
        `
          UPDATE dsp_cases
          SET dispute_status = $3,
              decision_reason = $4,
              credit_type = $5,
              credit_amount = $6::numeric,
              requires_manual_review = $7,
              updated_at = $8::timestamptz
          WHERE case_id = $1
            AND dispute_status = $2
          RETURNING ${CASE_COLUMNS}
        `,
        [
          caseId,
          expectedStatus,
          change.dispute_status,
          change.decision_reason,
          change.credit_type,
          change.credit_amount,
          change.requires_manual_review,
          change.updated_at,
        ],
      );
      const row = result.rows[0];
      if (row) {
        return mapCaseRow(row);
      }
      const exists = await this.pool.query("SELECT 1 FROM dsp_cases WHERE case_id = $1", [caseId]);
      if (exists.rowCount === 0) {
        throw new StoreError("not_found", `Case '${caseId}' not found.`);
      }
      throw new StoreError(
        "conditional_check_failed",
        `Case '${caseId}' is no longer in status '${expectedStatus}'.`,
      );
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

  private async inTransaction(run: (client: PoolClient) => Promise<void>): Promise<void> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw classifyPostgresError(error);
    }
    await runInTransaction(client, run);
  }
}
