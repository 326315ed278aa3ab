/**
 * Peg Engine - Collateral & Debt Ledger
 *
 * PositionLedger holds committed state. Every mutation goes through a
 * LedgerTransaction, a staged overlay that reads through to committed state
 * and is applied in one step on commit. Nothing outside the engine writes
 * here; committed reads never observe a transaction in progress.
 *
 * Keys are checksummed addresses; callers normalise before reaching the ledger.
 */

import { InsufficientBalanceError } from "./errors";

export interface PositionReader {
  collateralOf(user: string, asset: string): bigint;
  debtOf(user: string): bigint;
}

export type LedgerMutation =
  | { kind: "collateral"; user: string; asset: string; delta: bigint }
  | { kind: "debt"; user: string; delta: bigint };

const positionKey = (user: string, asset: string): string => `${user}/${asset}`;

// ============================================================
//                     COMMITTED STATE
// ============================================================

export class PositionLedger implements PositionReader {
  private readonly collateral = new Map<string, bigint>();
  private readonly debt = new Map<string, bigint>();
  private readonly depositedByAsset = new Map<string, bigint>();
  private totalDebtMinted = 0n;
  private readonly log: LedgerMutation[] = [];
  private open: LedgerTransaction | null = null;

  collateralOf(user: string, asset: string): bigint {
    return this.collateral.get(positionKey(user, asset)) ?? 0n;
  }

  debtOf(user: string): bigint {
    return this.debt.get(user) ?? 0n;
  }

  /** Sum of every user's deposit of `asset` */
  totalDeposited(asset: string): bigint {
    return this.depositedByAsset.get(asset) ?? 0n;
  }

  totalDebt(): bigint {
    return this.totalDebtMinted;
  }

  /** Snapshot of the append-only log of committed mutations, oldest first */
  history(): readonly LedgerMutation[] {
    return [...this.log];
  }

  /**
   * Open the single staged transaction. Single-writer: a second concurrent
   * transaction is a programming error.
   */
  begin(): LedgerTransaction {
    if (this.open) {
      throw new Error("PositionLedger: a transaction is already open");
    }
    const tx = new LedgerTransaction(this, () => {
      this.open = null;
    });
    this.open = tx;
    return tx;
  }

  /** Called by LedgerTransaction.commit() */
  apply(mutations: readonly LedgerMutation[]): void {
    for (const m of mutations) {
      if (m.kind === "collateral") {
        const key = positionKey(m.user, m.asset);
        this.collateral.set(key, (this.collateral.get(key) ?? 0n) + m.delta);
        this.depositedByAsset.set(m.asset, this.totalDeposited(m.asset) + m.delta);
      } else {
        this.debt.set(m.user, this.debtOf(m.user) + m.delta);
        this.totalDebtMinted += m.delta;
      }
      this.log.push(m);
    }
  }
}

// ============================================================
//                     STAGED TRANSACTION
// ============================================================

export class LedgerTransaction implements PositionReader {
  private readonly collateral = new Map<string, bigint>();
  private readonly debt = new Map<string, bigint>();
  private readonly staged: LedgerMutation[] = [];
  private closed = false;

  constructor(
    private readonly base: PositionLedger,
    private readonly onClose: () => void
  ) {}

  get mutations(): readonly LedgerMutation[] {
    return this.staged;
  }

  collateralOf(user: string, asset: string): bigint {
    return this.collateral.get(positionKey(user, asset)) ?? this.base.collateralOf(user, asset);
  }

  debtOf(user: string): bigint {
    return this.debt.get(user) ?? this.base.debtOf(user);
  }

  increaseCollateral(user: string, asset: string, amount: bigint): void {
    this.ensureOpen();
    this.collateral.set(positionKey(user, asset), this.collateralOf(user, asset) + amount);
    this.staged.push({ kind: "collateral", user, asset, delta: amount });
  }

  decreaseCollateral(user: string, asset: string, amount: bigint): void {
    this.ensureOpen();
    const available = this.collateralOf(user, asset);
    if (amount > available) {
      throw new InsufficientBalanceError(`collateral ${asset} of ${user}`, available, amount);
    }
    this.collateral.set(positionKey(user, asset), available - amount);
    this.staged.push({ kind: "collateral", user, asset, delta: -amount });
  }

  increaseDebt(user: string, amount: bigint): void {
    this.ensureOpen();
    this.debt.set(user, this.debtOf(user) + amount);
    this.staged.push({ kind: "debt", user, delta: amount });
  }

  decreaseDebt(user: string, amount: bigint): void {
    this.ensureOpen();
    const available = this.debtOf(user);
    if (amount > available) {
      throw new InsufficientBalanceError(`debt of ${user}`, available, amount);
    }
    this.debt.set(user, available - amount);
    this.staged.push({ kind: "debt", user, delta: -amount });
  }

  commit(): void {
    this.ensureOpen();
    this.closed = true;
    this.onClose();
    this.base.apply(this.staged);
  }

  /** Drop staged mutations. Safe to call after commit. */
  discard(): void {
    if (this.closed) return;
    this.closed = true;
    this.onClose();
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("LedgerTransaction: transaction already closed");
    }
  }
}
