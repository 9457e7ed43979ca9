import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  InMemoryAccountStore,
  flattenAccountSeed,
  loadAccountSeedFile,
  parseAccountSeed,
} from "../src/adapters/inmemory/account-store.js";
import { AppError } from "../src/infra/app-error.js";
import { buildSeed } from "./fixtures.js";

describe("Account seed", () => {
  it("flattens cards without transactions into a single row", () => {
    const rows = flattenAccountSeed(buildSeed()).filter((row) => row.customer_id === "cust-002");

    expect(rows).toHaveLength(2);
    expect(rows[1]).toEqual({
      customer_id: "cust-002",
      cardholder_name: "Other Holder",
      card_number: "5500000000009999",
      card_type: "MASTERCARD",
      card_status: "inactive",
      expiry_date: "01/24",
      transaction_id: null,
      amount: null,
      currency: null,
      transaction_date: null,
      merchant: null,
      description: null,
      status: null,
    });
  });

  it("fills missing optional fields with null", () => {
    const seed = parseAccountSeed({
      customers: [
        {
          customer_id: "cust-9",
          cards: [{ card_number: "4000000000000002", transactions: [{ transaction_id: "t-1", transaction_date: "2026-01-01T00:00:00Z" }] }],
        },
      ],
    });

    expect(seed.customers[0]?.cardholder_name).toBeNull();
    expect(seed.customers[0]?.cards[0]?.transactions[0]).toEqual({
      transaction_id: "t-1",
      amount: null,
      currency: null,
      transaction_date: "2026-01-01T00:00:00Z",
      merchant: null,
      description: null,
      status: null,
    });
  });

  it("rejects malformed entries with their path", () => {
    expect(() => parseAccountSeed({})).toThrowError("Account seed entry 'customers' must be an array.");
    expect(() =>
      parseAccountSeed({
        customers: [
          {
            customer_id: "cust-9",
            cards: [{ card_number: "4000000000000002", transactions: [{ transaction_id: "t-1", transaction_date: "x", amount: "1e3" }] }],
          },
        ],
      }),
    ).toThrowError("Account seed entry 'customers[0].cards[0].transactions[0].amount' must be a decimal string.");
  });

  it("loads a seed file from disk", () => {
    const directory = mkdtempSync(join(tmpdir(), "dispute-seed-"));
    const path = join(directory, "accounts.json");
    writeFileSync(path, JSON.stringify(buildSeed()));

    expect(loadAccountSeedFile(path).customers.map((customer) => customer.customer_id)).toEqual([
      "cust-001",
      "cust-002",
    ]);

    const broken = join(directory, "broken.json");
    writeFileSync(broken, "{");
    expect(() => loadAccountSeedFile(broken)).toThrowError(AppError);
    expect(() => loadAccountSeedFile(join(directory, "missing.json"))).toThrowError(AppError);
  });

  it("looks up rows by customer and transaction", async () => {
    const store = new InMemoryAccountStore(buildSeed());

    expect(await store.queryByCustomer("cust-001")).toHaveLength(7);
    expect((await store.getByTransaction("txn-other"))?.card_number).toBe("5500000000000004");
    expect(await store.getByTransaction("txn-none")).toBeNull();
    expect(await store.queryByCustomer("cust-404")).toEqual([]);
  });
});
