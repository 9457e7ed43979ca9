import { readFileSync } from "node:fs";
import { isDecimalString } from "../../domain/money.js";
import { AppError } from "../../infra/app-error.js";
import type { AccountStorePort, StoredAccountRow } from "../../ports/account-store.js";

export interface AccountSeedTransaction {
  transaction_id: string;
  amount: string | null;
  currency: string | null;
  transaction_date: string;
  merchant: string | null;
  description: string | null;
  status: string | null;
}

export interface AccountSeedCard {
  card_number: string;
  card_type: string | null;
  card_status: string | null;
  expiry_date: string | null;
  transactions: AccountSeedTransaction[];
}

export interface AccountSeedCustomer {
  customer_id: string;
  cardholder_name: string | null;
  cards: AccountSeedCard[];
}

export interface AccountSeed {
  customers: AccountSeedCustomer[];
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function invalidSeed(path: string, expectation: string): AppError {
  return new AppError(500, "invalid_runtime_config", `Account seed entry '${path}' ${expectation}.`);
}

function requireString(value: unknown, path: string): string {
  if (typeof value !== "string" || value.trim().length === 0) {
    throw invalidSeed(path, "must be a non-empty string");
  }
  return value;
}

function optionalString(value: unknown, path: string): string | null {
  if (value === undefined || value === null) {
    return null;
  }
  if (typeof value !== "string") {
    throw invalidSeed(path, "must be a string or null");
  }
  return value;
}

function parseSeedTransaction(value: unknown, path: string): AccountSeedTransaction {
  if (!isObject(value)) {
    throw invalidSeed(path, "must be an object");
  }
  const amount = optionalString(value.amount, `${path}.amount`);
  if (amount !== null && !isDecimalString(amount)) {
    throw invalidSeed(`${path}.amount`, "must be a decimal string");
  }
  return {
    transaction_id: requireString(value.transaction_id, `${path}.transaction_id`),
    amount,
    currency: optionalString(value.currency, `${path}.currency`),
    transaction_date: requireString(value.transaction_date, `${path}.transaction_date`),
    merchant: optionalString(value.merchant, `${path}.merchant`),
    description: optionalString(value.description, `${path}.description`),
    status: optionalString(value.status, `${path}.status`),
  };
}

function parseSeedCard(value: unknown, path: string): AccountSeedCard {
  if (!isObject(value)) {
    throw invalidSeed(path, "must be an object");
  }
  const transactions = value.transactions ?? [];
  if (!Array.isArray(transactions)) {
    throw invalidSeed(`${path}.transactions`, "must be an array");
  }
  return {
    card_number: requireString(value.card_number, `${path}.card_number`),
    card_type: optionalString(value.card_type, `${path}.card_type`),
    card_status: optionalString(value.card_status, `${path}.card_status`),
    expiry_date: optionalString(value.expiry_date, `${path}.expiry_date`),
    transactions: transactions.map((item, index) => parseSeedTransaction(item, `${path}.transactions[${index}]`)),
  };
}

export function parseAccountSeed(value: unknown): AccountSeed {
  if (!isObject(value) || !Array.isArray(value.customers)) {
    throw invalidSeed("customers", "must be an array");
  }
  const customers = value.customers.map((customer, index): AccountSeedCustomer => {
    const path = `customers[${index}]`;
    if (!isObject(customer)) {
      throw invalidSeed(path, "must be an object");
    }
    const cards = customer.cards ?? [];
    if (!Array.isArray(cards)) {
      throw invalidSeed(`${path}.cards`, "must be an array");
    }
    return {
      customer_id: requireString(customer.customer_id, `${path}.customer_id`),
      cardholder_name: optionalString(customer.cardholder_name, `${path}.cardholder_name`),
      cards: cards.map((card, cardIndex) => parseSeedCard(card, `${path}.cards[${cardIndex}]`)),
    };
  });
  return { customers };
}

export function loadAccountSeedFile(path: string): AccountSeed {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError(500, "invalid_runtime_config", `Unable to read account seed '${path}': ${reason}`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new AppError(500, "invalid_runtime_config", `Account seed '${path}' is not valid JSON: ${reason}`);
  }
  return parseAccountSeed(parsed);
}

export function flattenAccountSeed(seed: AccountSeed): StoredAccountRow[] {
  const rows: StoredAccountRow[] = [];
  for (const customer of seed.customers) {
    for (const card of customer.cards) {
      const cardColumns = {
        customer_id: customer.customer_id,
        cardholder_name: customer.cardholder_name,
        card_number: card.card_number,
        card_type: card.card_type,
        card_status: card.card_status,
        expiry_date: card.expiry_date,
      };
      if (card.transactions.length === 0) {
        rows.push({
          ...cardColumns,
          transaction_id: null,
          amount: null,
          currency: null,
          transaction_date: null,
          merchant: null,
          description: null,
          status: null,
        });
        continue;
      }
      for (const transaction of card.transactions) {
        rows.push({ ...cardColumns, ...transaction });
      }
    }
  }
  return rows;
}

export class InMemoryAccountStore implements AccountStorePort {
  private readonly rows: StoredAccountRow[];

  constructor(seed: AccountSeed = { customers: [] }) {
    this.rows = flattenAccountSeed(seed);
  }

  async queryByCustomer(customerId: string): Promise<StoredAccountRow[]> {
    return this.rows.filter((row) => row.customer_id === customerId).map((row) => ({ ...row }));
  }

  async getByTransaction(transactionId: string): Promise<StoredAccountRow | null> {
    const row = this.rows.find((item) => item.transaction_id === transactionId);
    return row ? { ...row } : null;
  }

  async ping(): Promise<void> {}
}
