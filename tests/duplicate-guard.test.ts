import { describe, expect, it } from "vitest";
import { InMemoryCaseStore } from "../src/adapters/inmemory/case-store.js";
import type { DisputeStatus } from "../src/domain/types.js";
import type { StoredCaseItem } from "../src/ports/case-store.js";
import { CARD_ONE, NOW, createHarness, daysBefore } from "./fixtures.js";

function storedCase(caseId: string, status: DisputeStatus, createdAt: string): StoredCaseItem {
  return {
    case_id: caseId,
    customer_id: "cust-001",
    card_id: CARD_ONE,
    transaction_id: "txn-large",
    transaction_date: daysBefore(NOW, 10),
    transaction_amount: "450.00",
    currency: "USD",
    merchant: "Test Merchant",
    dispute_status: status,
    decision_reason: "seeded",
    credit_type: status === "FORWARDED_TO_ACQUIRER" ? "TEMPORARY" : "NONE",
    credit_amount: status === "FORWARDED_TO_ACQUIRER" ? "450.00" : "0",
    auto_decided: true,
    requires_manual_review: status === "FORWARDED_TO_ACQUIRER",
    documents: [],
    created_at: createdAt,
    updated_at: createdAt,
  };
}

describe("DuplicateGuard", () => {
  it("reports no open case for a fresh transaction", async () => {
    const { guard } = createHarness();
    expect(await guard.hasOpenCase("txn-large")).toBe(false);
    expect(await guard.findBlockingCase("txn-large", "any")).toBeNull();
  });

  it("detects an open case", async () => {
    const cases = new InMemoryCaseStore();
    await cases.insertCase(storedCase("case_open", "FORWARDED_TO_ACQUIRER", daysBefore(NOW, 1)), {
      blockingStatuses: [],
    });
    const { guard } = createHarness({ caseStore: cases });

    expect(await guard.hasOpenCase("txn-large")).toBe(true);
    expect((await guard.findBlockingCase("txn-large", "open"))?.case_id).toBe("case_open");
  });

  it("lets a decided case block only in strict mode", async () => {
    const cases = new InMemoryCaseStore();
    await cases.insertCase(storedCase("case_done", "RESOLVED_CUSTOMER", daysBefore(NOW, 1)), {
      blockingStatuses: [],
    });
    const { guard } = createHarness({ caseStore: cases });

    expect(await guard.hasOpenCase("txn-large")).toBe(false);
    expect(await guard.findBlockingCase("txn-large", "open")).toBeNull();
    expect((await guard.findBlockingCase("txn-large", "any"))?.case_id).toBe("case_done");
  });

  it("logs a consistency warning when several open cases exist and still blocks", async () => {
    const cases = new InMemoryCaseStore();
    await cases.insertCase(storedCase("case_older", "FORWARDED_TO_ACQUIRER", daysBefore(NOW, 2)), {
      blockingStatuses: [],
    });
    await cases.insertCase(storedCase("case_newer", "FORWARDED_TO_ACQUIRER", daysBefore(NOW, 1)), {
      blockingStatuses: [],
    });
    const { guard, logger } = createHarness({ caseStore: cases });

    const blocking = await guard.findBlockingCase("txn-large", "open");

    expect(blocking?.case_id).toBe("case_newer");
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      {
        warning: "ConsistencyWarning",
        transaction_id: "txn-large",
        open_case_ids: ["case_newer", "case_older"],
      },
      "multiple open cases found for one transaction",
    );
  });
});
