export type StoreErrorKind =
  | "throttled"
  | "conditional_check_failed"
  | "validation"
  | "not_found"
  | "connectivity";

export class StoreError extends Error {
  constructor(
    readonly kind: StoreErrorKind,
    message: string,
    readonly existingCaseId?: string,
  ) {
    super(message);
    this.name = "StoreError";
  }
}
