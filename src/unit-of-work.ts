/**
 * Peg Engine - Unit of Work
 *
 * One instance per public operation. Collects:
 *   - staged ledger mutations (LedgerTransaction)
 *   - notifications, delivered only after commit
 *   - external interactions, run after every internal check has passed
 *
 * Interaction phases:
 *   settle:  moves value INTO custody (pull tokens, burn custody balance).
 *             Each registers an undo that returns what it took.
 *   release: moves value OUT of custody (pay collateral, mint). Runs after
 *             all settles and is never compensated, so an operation carries
 *             at most one release and it is the final step.
 *
 * On failure: the ledger transaction is dropped, completed settles are undone
 * newest-first, and the original error is rethrown.
 */

import type { Logger } from "winston";
import { RollbackFailedError } from "./errors";
import type { LedgerTransaction } from "./ledger";
import type { EngineEvent, OperationName } from "./types";

export type InteractionPhase = "settle" | "release";

interface Interaction {
  label: string;
  phase: InteractionPhase;
  run: () => void;
  undo?: () => void;
}

export class UnitOfWork {
  readonly events: EngineEvent[] = [];
  private readonly interactions: Interaction[] = [];
  private readonly completedUndos: Array<{ label: string; undo: () => void }> = [];

  constructor(
    readonly operation: OperationName,
    readonly tx: LedgerTransaction,
    private readonly logger: Logger
  ) {}

  /** True once at least one settle has run and would need compensating */
  get hasCompletedSettles(): boolean {
    return this.completedUndos.length > 0;
  }

  notify(event: EngineEvent): void {
    this.events.push(event);
  }

  settle(label: string, run: () => void, undo: () => void): void {
    this.interactions.push({ label, phase: "settle", run, undo });
  }

  release(label: string, run: () => void): void {
    if (this.interactions.some((i) => i.phase === "release")) {
      throw new Error(`${this.operation}: only one release interaction is allowed (${label})`);
    }
    this.interactions.push({ label, phase: "release", run });
  }

  /** Run queued interactions: all settles in queue order, then the release */
  executeInteractions(): void {
    const ordered = [
      ...this.interactions.filter((i) => i.phase === "settle"),
      ...this.interactions.filter((i) => i.phase === "release"),
    ];
    for (const interaction of ordered) {
      interaction.run();
      if (interaction.undo) {
        this.completedUndos.push({ label: interaction.label, undo: interaction.undo });
      }
    }
  }

  /**
   * Undo everything this operation did and rethrow `cause`.
   * Throws RollbackFailedError if any compensation fails.
   */
  rollback(cause: unknown): never {
    this.tx.discard();

    const failures: string[] = [];
    for (const { label, undo } of [...this.completedUndos].reverse()) {
      try {
        undo();
      } catch (err) {
        failures.push(label);
        this.logger.error("Compensation failed", {
          operation: this.operation,
          interaction: label,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
    this.completedUndos.length = 0;

    if (failures.length > 0) {
      throw new RollbackFailedError(this.operation, cause, failures);
    }
    throw cause;
  }
}
