/**
 * Position Ledger Unit Tests
 * Staged transactions, commit/discard, and non-negative balances
 */

import { InsufficientBalanceError } from "../errors";
import { PositionLedger } from "../ledger";
import { addr } from "../../test/helpers/mocks";

const USER = addr(0xa1);
const OTHER = addr(0xa2);
const WETH = addr(0x1001);
const WBTC = addr(0x1002);

describe("PositionLedger", () => {
  it("should start empty", () => {
    const ledger = new PositionLedger();
    expect(ledger.collateralOf(USER, WETH)).toBe(0n);
    expect(ledger.debtOf(USER)).toBe(0n);
    expect(ledger.totalDebt()).toBe(0n);
    expect(ledger.totalDeposited(WETH)).toBe(0n);
    expect(ledger.history()).toHaveLength(0);
  });

  it("should apply staged mutations on commit", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    tx.increaseCollateral(USER, WETH, 10n);
    tx.increaseCollateral(OTHER, WETH, 5n);
    tx.increaseDebt(USER, 3n);
    tx.commit();

    expect(ledger.collateralOf(USER, WETH)).toBe(10n);
    expect(ledger.collateralOf(OTHER, WETH)).toBe(5n);
    expect(ledger.collateralOf(USER, WBTC)).toBe(0n);
    expect(ledger.totalDeposited(WETH)).toBe(15n);
    expect(ledger.debtOf(USER)).toBe(3n);
    expect(ledger.totalDebt()).toBe(3n);
    expect(ledger.history()).toEqual([
      { kind: "collateral", user: USER, asset: WETH, delta: 10n },
      { kind: "collateral", user: OTHER, asset: WETH, delta: 5n },
      { kind: "debt", user: USER, delta: 3n },
    ]);
  });

  it("should hide staged state from committed reads", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    tx.increaseCollateral(USER, WETH, 10n);

    expect(tx.collateralOf(USER, WETH)).toBe(10n);
    expect(ledger.collateralOf(USER, WETH)).toBe(0n);
    tx.discard();
  });

  it("should drop staged mutations on discard", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    tx.increaseDebt(USER, 7n);
    tx.discard();

    expect(ledger.debtOf(USER)).toBe(0n);
    expect(ledger.history()).toHaveLength(0);
  });

  it("should read through to committed state inside a transaction", () => {
    const ledger = new PositionLedger();
    const first = ledger.begin();
    first.increaseCollateral(USER, WETH, 10n);
    first.commit();

    const second = ledger.begin();
    second.decreaseCollateral(USER, WETH, 4n);
    expect(second.collateralOf(USER, WETH)).toBe(6n);
    second.commit();

    expect(ledger.collateralOf(USER, WETH)).toBe(6n);
    expect(ledger.totalDeposited(WETH)).toBe(6n);
  });

  it("should reject a collateral decrement below zero", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    tx.increaseCollateral(USER, WETH, 10n);
    expect(() => tx.decreaseCollateral(USER, WETH, 11n)).toThrow(InsufficientBalanceError);
    expect(tx.collateralOf(USER, WETH)).toBe(10n);
    tx.discard();
  });

  it("should return history snapshots that later commits do not change", () => {
    const ledger = new PositionLedger();
    const first = ledger.begin();
    first.increaseDebt(USER, 3n);
    first.commit();
    const snapshot = ledger.history();

    const second = ledger.begin();
    second.increaseDebt(OTHER, 4n);
    second.increaseCollateral(OTHER, WBTC, 1n);
    second.commit();

    expect(snapshot).toEqual([{ kind: "debt", user: USER, delta: 3n }]);
    expect(ledger.history()).toHaveLength(3);
    expect(ledger.history()).not.toBe(ledger.history());
  });

  it("should reject a debt decrement below zero", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    expect(() => tx.decreaseDebt(USER, 1n)).toThrow(InsufficientBalanceError);
    tx.discard();
  });

  it("should allow only one open transaction", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    expect(() => ledger.begin()).toThrow("already open");
    tx.discard();
    expect(() => ledger.begin().discard()).not.toThrow();
  });

  it("should refuse writes after commit", () => {
    const ledger = new PositionLedger();
    const tx = ledger.begin();
    tx.commit();
    expect(() => tx.increaseDebt(USER, 1n)).toThrow("already closed");
    expect(() => tx.discard()).not.toThrow();
  });
});
