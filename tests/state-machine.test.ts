import { describe, expect, it } from "vitest";
import {
  assertTransition,
  canTransition,
  isTerminalStatus,
  openStatuses,
} from "../src/domain/state-machine.js";
import { DISPUTE_STATUSES } from "../src/domain/types.js";
import { AppError } from "../src/infra/app-error.js";

describe("Dispute state machine", () => {
  it("allows manual resolution of forwarded cases", () => {
    expect(canTransition("FORWARDED_TO_ACQUIRER", "RESOLVED_ACQUIRER")).toBe(true);
    expect(canTransition("FORWARDED_TO_ACQUIRER", "RESOLVED_CUSTOMER")).toBe(true);
    expect(canTransition("FORWARDED_TO_ACQUIRER", "CLOSED")).toBe(true);
  });

  it("blocks every transition out of a terminal status", () => {
    for (const from of DISPUTE_STATUSES.filter(isTerminalStatus)) {
      for (const to of DISPUTE_STATUSES) {
        expect(canTransition(from, to)).toBe(false);
      }
    }
    expect(() => assertTransition("REJECTED_TIME_BARRED", "RESOLVED_CUSTOMER")).toThrowError(AppError);
    expect(() => assertTransition("CLOSED", "FORWARDED_TO_ACQUIRER")).toThrowError(
      "Transition from 'CLOSED' to 'FORWARDED_TO_ACQUIRER' is not allowed.",
    );
  });

  it("marks terminal statuses", () => {
    expect(isTerminalStatus("REJECTED_TIME_BARRED")).toBe(true);
    expect(isTerminalStatus("RESOLVED_CUSTOMER")).toBe(true);
    expect(isTerminalStatus("RESOLVED_ACQUIRER")).toBe(true);
    expect(isTerminalStatus("CLOSED")).toBe(true);
    expect(isTerminalStatus("FORWARDED_TO_ACQUIRER")).toBe(false);
    expect(openStatuses()).toEqual(["FORWARDED_TO_ACQUIRER"]);
  });
});
