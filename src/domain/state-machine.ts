import { DISPUTE_STATUSES, type DisputeStatus } from "./types.js";
import { AppError } from "../infra/app-error.js";

const ALLOWED_TRANSITIONS: Record<DisputeStatus, DisputeStatus[]> = {
  FORWARDED_TO_ACQUIRER: ["RESOLVED_ACQUIRER", "RESOLVED_CUSTOMER", "CLOSED"],
  REJECTED_TIME_BARRED: [],
  RESOLVED_CUSTOMER: [],
  RESOLVED_ACQUIRER: [],
  CLOSED: [],
};

const TERMINAL_STATUSES: Set<DisputeStatus> = new Set([
  "REJECTED_TIME_BARRED",
  "RESOLVED_CUSTOMER",
  "RESOLVED_ACQUIRER",
  "CLOSED",
]);

export function canTransition(current: DisputeStatus, next: DisputeStatus): boolean {
  const allowed = ALLOWED_TRANSITIONS[current];
  return allowed.includes(next);
}

export function isTerminalStatus(status: DisputeStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export function openStatuses(): DisputeStatus[] {
  return DISPUTE_STATUSES.filter((status) => !isTerminalStatus(status));
}

export function assertTransition(current: DisputeStatus, next: DisputeStatus): void {
  if (canTransition(current, next)) {
    return;
  }
  throw new AppError(
    409,
    "invalid_state_transition",
    `Transition from '${current}' to '${next}' is not allowed.`,
  );
}
