import { describe, expect, it } from "vitest";
import {
  classifyPostgresError,
  mapDecimal,
  mapOptionalDecimal,
  mapOptionalTimestamp,
  mapTimestamp,
} from "../src/adapters/postgres/store-errors.js";
import { StoreError } from "../src/ports/store-error.js";

function driverError(code: string, message = "driver failure"): Error {
  return Object.assign(new Error(message), { code });
}

function kindOf(error: unknown): string | undefined {
  return error instanceof StoreError ? error.kind : undefined;
}

describe("classifyPostgresError", () => {
  it("maps lock and capacity failures to throttled", () => {
    for (const code of ["53300", "40001", "40P01", "55P03", "57014"]) {
      expect(kindOf(classifyPostgresError(driverError(code)))).toBe("throttled");
    }
  });

  it("maps unique violations to a failed conditional write", () => {
    const classified = classifyPostgresError(driverError("23505", "duplicate key value"));
    expect(kindOf(classified)).toBe("conditional_check_failed");
    expect(classified).toMatchObject({ message: "duplicate key value" });
  });

  it("maps constraint and data errors to validation", () => {
    expect(kindOf(classifyPostgresError(driverError("23514")))).toBe("validation");
    expect(kindOf(classifyPostgresError(driverError("22P02")))).toBe("validation");
  });

  it("maps socket and connection errors to connectivity", () => {
    expect(kindOf(classifyPostgresError(driverError("ECONNREFUSED")))).toBe("connectivity");
    expect(kindOf(classifyPostgresError(driverError("08006")))).toBe("connectivity");
    expect(kindOf(classifyPostgresError(driverError("57P01")))).toBe("connectivity");
  });

  it("passes through errors it does not recognise", () => {
    const plain = new Error("boom");
    expect(classifyPostgresError(plain)).toBe(plain);
    const unknownCode = driverError("XX000");
    expect(classifyPostgresError(unknownCode)).toBe(unknownCode);
    const existing = new StoreError("not_found", "gone");
    expect(classifyPostgresError(existing)).toBe(existing);
  });
});

describe("row mappers", () => {
  it("renders timestamps as ISO strings", () => {
    expect(mapTimestamp(new Date("2026-10-19T12:00:00Z"))).toBe("2026-10-19T12:00:00.000Z");
    expect(mapTimestamp("2026-10-19T12:00:00.000Z")).toBe("2026-10-19T12:00:00.000Z");
    expect(mapOptionalTimestamp(null)).toBeNull();
  });

  it("keeps numeric columns as exact strings", () => {
    expect(mapDecimal("450.00", "amount")).toBe("450.00");
    expect(mapDecimal(12, "amount")).toBe("12");
    expect(mapOptionalDecimal(null, "amount")).toBeNull();
  });

  it("rejects numeric columns that are not plain decimals", () => {
    expect(() => mapDecimal("NaN", "credit_amount")).toThrowError("Unable to map numeric field 'credit_amount'.");
    expect(() => mapDecimal({}, "credit_amount")).toThrowError(StoreError);
  });
});
