import { vi } from "vitest";
import { InMemoryAccountStore, type AccountSeed } from "../src/adapters/inmemory/account-store.js";
import { InMemoryCaseStore } from "../src/adapters/inmemory/case-store.js";
import { CaseLifecycleManager, type CaseLifecycleOptions } from "../src/application/case-lifecycle.js";
import { DuplicateGuard } from "../src/application/duplicate-guard.js";
import { PersistenceGateway } from "../src/application/persistence-gateway.js";
import { RetryPolicy } from "../src/application/retry-policy.js";
import { DisputeDecisionEngine } from "../src/domain/decision-engine.js";
import type { ClockPort } from "../src/infra/clock.js";
import type { CaseStorePort } from "../src/ports/case-store.js";

export const NOW = "2026-10-19T12:00:00.000Z";

const MS_PER_DAY = 86_400_000;

export function daysBefore(iso: string, days: number): string {
  return new Date(Date.parse(iso) - days * MS_PER_DAY).toISOString();
}

export class FixedClock implements ClockPort {
  constructor(private current: string = NOW) {}

  nowIso(): string {
    return this.current;
  }

  set(iso: string): void {
    this.current = iso;
  }
}

export function createRecordingLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export const CARD_ONE = "4111111111111111";
export const CARD_TWO = "5500000000000004";

export function buildSeed(): AccountSeed {
  const transaction = (transaction_id: string, amount: string | null, transaction_date: string) => ({
    transaction_id,
    amount,
    currency: "USD",
    transaction_date,
    merchant: "Test Merchant",
    description: null,
    status: "settled",
  });

  return {
    customers: [
      {
        customer_id: "cust-001",
        cardholder_name: "Test Holder",
        cards: [
          {
            card_number: CARD_ONE,
            card_type: "VISA",
            card_status: "active",
            expiry_date: "12/28",
            transactions: [
              transaction("txn-small", "45.00", daysBefore(NOW, 10)),
              transaction("txn-large", "450.00", daysBefore(NOW, 10)),
              transaction("txn-old", "20.00", daysBefore(NOW, 650)),
              transaction("txn-boundary", "100.00", daysBefore(NOW, 600)),
              transaction("txn-no-amount", null, daysBefore(NOW, 5)),
              transaction("txn-negative", "-5.00", daysBefore(NOW, 5)),
              transaction("txn-future", "10.00", "2026-10-20T12:00:00.000Z"),
            ],
          },
        ],
      },
      {
        customer_id: "cust-002",
        cardholder_name: "Other Holder",
        cards: [
          {
            card_number: CARD_TWO,
            card_type: "MASTERCARD",
            card_status: "active",
            expiry_date: "01/29",
            transactions: [transaction("txn-other", "30.00", daysBefore(NOW, 3))],
          },
          {
            card_number: "5500000000009999",
            card_type: "MASTERCARD",
            card_status: "inactive",
            expiry_date: "01/24",
            transactions: [],
          },
        ],
      },
    ],
  };
}

export interface HarnessOptions {
  caseStore?: CaseStorePort;
  lifecycle?: Partial<CaseLifecycleOptions>;
}

export function createHarness(options: HarnessOptions = {}) {
  const accounts = new InMemoryAccountStore(buildSeed());
  const cases = options.caseStore ?? new InMemoryCaseStore();
  const clock = new FixedClock();
  const logger = createRecordingLogger();
  const sleep = vi.fn(async (_ms: number): Promise<void> => {});
  const retry = new RetryPolicy({ maxAttempts: 3, initialDelayMs: 500, backoff: "exponential", sleep });
  const gateway = new PersistenceGateway(accounts, cases, retry, logger);
  const guard = new DuplicateGuard(gateway, logger);
  const engine = new DisputeDecisionEngine();
  const lifecycle = new CaseLifecycleManager(gateway, guard, engine, clock, logger, options.lifecycle);
  return { accounts, cases, clock, logger, sleep, retry, gateway, guard, engine, lifecycle };
}
