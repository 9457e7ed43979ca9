import { resolve } from "node:path";
import { Pool } from "pg";
import { loadAccountSeedFile } from "../src/adapters/inmemory/account-store.js";

async function main(): Promise<void> {
  const connectionString = process.env.DSP_POSTGRES_URL?.trim();
  if (!connectionString) {
    throw new Error("DSP_POSTGRES_URL is required.");
  }

  const seedPath = resolve(process.cwd(), process.argv[2] ?? process.env.DSP_SEED_FILE ?? "data/sample-accounts.json");
  const seed = loadAccountSeedFile(seedPath);
  const pool = new Pool({ connectionString });
  const client = await pool.connect();
  let transactions = 0;

  try {
    await client.query("BEGIN");
    for (const customer of seed.customers) {
      await client.query(
        `
          INSERT INTO dsp_customers (customer_id, cardholder_name)
          VALUES ($1, $2)
          ON CONFLICT (customer_id) DO UPDATE SET cardholder_name = EXCLUDED.cardholder_name
        `,
        [customer.customer_id, customer.cardholder_name],
      );
      for (const card of customer.cards) {
        await client.query(
          `
            INSERT INTO dsp_cards (card_number, customer_id, card_type, card_status, expiry_date)
            VALUES ($1, $2, $3, $4, $5)
            ON CONFLICT (card_number) DO UPDATE
            SET customer_id = EXCLUDED.customer_id,
                card_type = EXCLUDED.card_type,
                card_status = EXCLUDED.card_status,
                expiry_date = EXCLUDED.expiry_date
          `,
          [card.card_number, customer.customer_id, card.card_type, card.card_status, card.expiry_date],
        );
        for (const transaction of card.transactions) {
          await client.query(
            `
              INSERT INTO dsp_transactions (
                transaction_id, card_number, amount, currency, transaction_date, merchant, description, status
              )
              VALUES ($1, $2, $3::numeric, $4, $5::timestamptz, $6, $7, $8)
              ON CONFLICT (transaction_id) DO NOTHING
            `,
            [
              transaction.transaction_id,
              card.card_number,
              transaction.amount,
              transaction.currency,
              transaction.transaction_date,
              transaction.merchant,
              transaction.description,
              transaction.status,
            ],
          );
          transactions += 1;
        }
      }
    }
    await client.query("COMMIT");
    console.log(`db:seed OK (${seed.customers.length} customers, ${transactions} transactions from ${seedPath})`);
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
    await pool.end();
  }
}

await main();
