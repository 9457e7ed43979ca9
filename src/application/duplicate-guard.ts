import { isTerminalStatus } from "../domain/state-machine.js";
import type { CaseRecord } from "../domain/types.js";
import type { LoggerPort } from "../infra/logger.js";
import type { PersistenceGateway } from "./persistence-gateway.js";

export type BlockingMode = "open" | "any";

export class DuplicateGuard {
  constructor(
    private readonly gateway: PersistenceGateway,
    private readonly logger: LoggerPort,
  ) {}

  async hasOpenCase(transactionId: string): Promise<boolean> {
    return (await this.findBlockingCase(transactionId, "open")) !== null;
  }

  /**
   * Returns the case that prevents a new filing for the transaction, latest first.
   * In "any" mode a decided case blocks as well as an open one.
   */
  async findBlockingCase(transactionId: string, mode: BlockingMode): Promise<CaseRecord | null> {
    const cases = await this.gateway.listCasesForTransaction(transactionId);
    const open = cases.filter((item) => !isTerminalStatus(item.dispute_status));

    if (open.length > 1) {
      this.logger.warn(
        {
          warning: "ConsistencyWarning",
          transaction_id: transactionId,
          open_case_ids: open.map((item) => item.case_id),
        },
        "multiple open cases found for one transaction",
      );
    }

    const [firstOpen] = open;
    if (firstOpen) {
      return firstOpen;
    }
    if (mode === "any") {
      return cases[0] ?? null;
    }
    return null;
  }
}
