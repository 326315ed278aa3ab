/**
 * Peg Engine - Operation Engine
 *
 * Accounting core for an overcollateralised issued asset. Users deposit
 * registered collateral, mint debt against it, and can be liquidated by
 * anyone once their health factor drops below 1.
 *
 * Every public mutation runs as one unit of work:
 *   checks → ledger effects → solvency assertions → interactions → commit
 * Solvency is asserted on the staged ledger, so an operation that would leave
 * an account unhealthy fails before any token moves. Anything that fails
 * later (a declined transfer or mint) unwinds completed interactions.
 *
 * Operations are synchronous and strictly sequential. A re-entrancy guard
 * rejects any mutating call made while another is in progress, e.g. from a
 * token callback.
 */

import { EventEmitter } from "events";
import { ethers } from "ethers";
import type { Logger } from "winston";
import type { EngineConfig } from "./config";
import {
  ADDITIONAL_FEED_PRECISION,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "./constants";
import { calculateHealthFactor } from "./calculator";
import {
  AssetNotSupportedError,
  EngineError,
  HealthFactorNotImprovedError,
  HealthFactorOkayError,
  InvalidAmountError,
  MintFailedError,
  ReentrantCallError,
  TransferFailedError,
} from "./errors";
import { PositionLedger, type LedgerMutation } from "./ledger";
import { createModuleLogger } from "./logger";
import {
  collateralDepositedGauge,
  liquidationsTotal,
  operationsTotal,
  rollbacksTotal,
  toUnits,
  totalDebtGauge,
} from "./metrics";
import { AssetRegistry } from "./registry";
import { StaleCheckedOracle } from "./oracle";
import { RiskEngine } from "./risk-engine";
import type {
  AccountInformation,
  EngineEvent,
  EngineEventName,
  EngineEvents,
  FeedDirectory,
  IssuedAssetLedger,
  OperationName,
  PriceOracle,
  TokenDirectory,
  TransferableToken,
} from "./types";
import { UnitOfWork } from "./unit-of-work";
import { formatHealthFactor, normalizeAddress } from "./utils";

// ============================================================
//                     TYPES
// ============================================================

export interface EngineParams {
  /** Custody address the engine's token handles act as */
  engineAddress: string;
  issuedAssetAddress: string;
  tokenAddresses: readonly string[];
  priceFeedAddresses: readonly string[];
}

export interface EngineDeps {
  issuedAsset: IssuedAssetLedger;
  tokens: TokenDirectory;
  oracle: PriceOracle;
}

export interface EngineOptions {
  logger?: Logger;
}

/** Collaborators for an engine wired from config; the oracle is built from the feeds */
export interface ConfiguredEngineDeps {
  issuedAsset: IssuedAssetLedger;
  tokens: TokenDirectory;
  feeds: FeedDirectory;
}

export interface ConfiguredEngineOptions extends EngineOptions {
  /** Current time in unix seconds, for oracle staleness */
  now?: () => number;
}

export interface LiquidationResult {
  debtCovered: bigint;
  collateralSeized: bigint;
  bonus: bigint;
  healthFactorBefore: bigint;
  healthFactorAfter: bigint;
}

// ============================================================
//                     ENGINE
// ============================================================

export class PegEngine {
  readonly address: string;
  private readonly issuedAssetAddress: string;
  private readonly registry: AssetRegistry;
  private readonly ledger = new PositionLedger();
  private readonly risk: RiskEngine;
  private readonly issuedAsset: IssuedAssetLedger;
  private readonly collateralTokens = new Map<string, TransferableToken>();
  private readonly emitter = new EventEmitter();
  private readonly logger: Logger;

  /** Operation currently holding the re-entrancy guard */
  private active: OperationName | null = null;
  /** Errors thrown by listeners during the current delivery */
  private listenerFailures: unknown[] = [];

  constructor(params: EngineParams, deps: EngineDeps, options: EngineOptions = {}) {
    this.logger = options.logger ?? createModuleLogger("PegEngine");
    this.address = normalizeAddress(params.engineAddress, "engine address");
    this.issuedAssetAddress = normalizeAddress(params.issuedAssetAddress, "issued asset address");
    this.registry = new AssetRegistry(params.tokenAddresses, params.priceFeedAddresses);
    this.risk = new RiskEngine(this.registry, deps.oracle, this.logger);
    this.issuedAsset = deps.issuedAsset;

    for (const token of this.registry.tokens) {
      this.collateralTokens.set(token, deps.tokens.tokenAt(token));
    }

    this.logger.info("Engine initialised", {
      engine: this.address,
      issuedAsset: this.issuedAssetAddress,
      collateralTokens: this.registry.tokens,
    });
  }

  /**
   * Wire an engine from a validated config. The staleness timeout comes from
   * `oracleTimeoutSeconds`; each configured feed is resolved through `deps.feeds`.
   */
  static fromConfig(
    config: EngineConfig,
    deps: ConfiguredEngineDeps,
    options: ConfiguredEngineOptions = {}
  ): PegEngine {
    const oracle = new StaleCheckedOracle({
      timeoutSeconds: config.oracleTimeoutSeconds,
      now: options.now,
      logger: options.logger,
    });
    for (const feed of config.priceFeeds) {
      oracle.addFeed(feed, deps.feeds.aggregatorAt(feed));
    }

    return new PegEngine(
      {
        engineAddress: config.engineAddress,
        issuedAssetAddress: config.issuedAssetAddress,
        tokenAddresses: config.collateralTokens,
        priceFeedAddresses: config.priceFeeds,
      },
      { issuedAsset: deps.issuedAsset, tokens: deps.tokens, oracle },
      { logger: options.logger }
    );
  }

  // ============================================================
  //                     NOTIFICATIONS
  // ============================================================

  /**
   * Subscribe to a notification. Listeners run after the operation has
   * committed and the guard is released. Every listener sees every event even
   * if another throws; the first listener error is then rethrown to the
   * caller without undoing the operation. Returns an unsubscribe function.
   */
  on<K extends EngineEventName>(name: K, listener: (payload: EngineEvents[K]) => void): () => void {
    const guarded = (payload: EngineEvents[K]): void => {
      try {
        listener(payload);
      } catch (err) {
        this.listenerFailures.push(err);
      }
    };
    this.emitter.on(name, guarded);
    return () => {
      this.emitter.off(name, guarded);
    };
  }

  // ============================================================
  //                     MUTATING OPERATIONS
  // ============================================================

  deposit(user: string, asset: string, amount: bigint): void {
    this.execute(
      "deposit",
      (work) => {
        this.depositCollateral(work, user, asset, amount);
      },
      () => this.logger.info("Collateral deposited", { user, asset, amount: ethers.formatEther(amount) })
    );
  }

  mint(user: string, amount: bigint): void {
    this.execute(
      "mint",
      (work) => {
        this.mintDebt(work, user, amount);
      },
      () => this.logger.info("Debt minted", { user, amount: ethers.formatEther(amount) })
    );
  }

  depositAndMint(user: string, asset: string, collateralAmount: bigint, debtAmount: bigint): void {
    this.execute(
      "depositAndMint",
      (work) => {
        this.depositCollateral(work, user, asset, collateralAmount);
        this.mintDebt(work, user, debtAmount);
      },
      () =>
        this.logger.info("Collateral deposited and debt minted", {
          user,
          asset,
          collateral: ethers.formatEther(collateralAmount),
          debt: ethers.formatEther(debtAmount),
        })
    );
  }

  redeem(user: string, asset: string, amount: bigint): void {
    this.execute(
      "redeem",
      (work) => {
        requirePositive(amount);
        const token = this.registry.resolve(asset);
        const owner = normalizeAddress(user, "user");
        this.redeemCollateral(work, token, amount, owner, owner);
        this.risk.assertHealthy(work.tx, owner);
      },
      () => this.logger.info("Collateral redeemed", { user, asset, amount: ethers.formatEther(amount) })
    );
  }

  burn(user: string, amount: bigint): void {
    this.execute(
      "burn",
      (work) => {
        requirePositive(amount);
        const owner = normalizeAddress(user, "user");
        this.burnDebt(work, amount, owner, owner);
        this.risk.assertHealthy(work.tx, owner);
      },
      () => this.logger.info("Debt burned", { user, amount: ethers.formatEther(amount) })
    );
  }

  /** Burn first so the redeem is checked against the reduced debt */
  redeemForBurn(user: string, asset: string, collateralAmount: bigint, debtAmount: bigint): void {
    this.execute(
      "redeemForBurn",
      (work) => {
        requirePositive(collateralAmount);
        requirePositive(debtAmount);
        const token = this.registry.resolve(asset);
        const owner = normalizeAddress(user, "user");
        this.burnDebt(work, debtAmount, owner, owner);
        this.redeemCollateral(work, token, collateralAmount, owner, owner);
        this.risk.assertHealthy(work.tx, owner);
      },
      () =>
        this.logger.info("Debt burned and collateral redeemed", {
          user,
          asset,
          collateral: ethers.formatEther(collateralAmount),
          debt: ethers.formatEther(debtAmount),
        })
    );
  }

  /**
   * Cover `debtToCover` of `targetUser`'s debt and seize the equivalent
   * collateral plus a 10% bonus.
   *
   * Known limitation: once an account's collateral is worth 110% of its debt
   * or less, no partial liquidation improves its health factor, and below
   * 100% the bonus cannot be paid at all. Such liquidations are rejected.
   */
  liquidate(liquidator: string, targetUser: string, asset: string, debtToCover: bigint): LiquidationResult {
    const { token: _seized, ...summary } = this.execute(
      "liquidate",
      (work) => {
        requirePositive(debtToCover);
        const token = this.registry.resolve(asset);
        const keeper = normalizeAddress(liquidator, "liquidator");
        const user = normalizeAddress(targetUser, "user");

        const healthFactorBefore = this.risk.healthFactor(work.tx, user);
        if (healthFactorBefore >= MIN_HEALTH_FACTOR) {
          throw new HealthFactorOkayError(user, healthFactorBefore);
        }

        const seize = this.risk.seizeAmount(token, debtToCover);
        this.redeemCollateral(work, token, seize.total, user, keeper);
        this.burnDebt(work, debtToCover, user, keeper);

        const healthFactorAfter = this.risk.healthFactor(work.tx, user);
        if (healthFactorAfter <= healthFactorBefore) {
          throw new HealthFactorNotImprovedError(user, healthFactorBefore, healthFactorAfter);
        }
        this.risk.assertHealthy(work.tx, keeper);

        work.notify({
          name: "Liquidated",
          payload: {
            liquidator: keeper,
            user,
            token,
            debtCovered: debtToCover,
            collateralSeized: seize.total,
            bonus: seize.bonus,
            healthFactorBefore,
            healthFactorAfter,
          },
        });
        return {
          token,
          debtCovered: debtToCover,
          collateralSeized: seize.total,
          bonus: seize.bonus,
          healthFactorBefore,
          healthFactorAfter,
        };
      },
      (result) => {
        liquidationsTotal.inc({ token: result.token });
        this.logger.warn("Position liquidated", {
          liquidator,
          user: targetUser,
          token: result.token,
          debtCovered: ethers.formatEther(result.debtCovered),
          collateralSeized: ethers.formatEther(result.collateralSeized),
          healthFactorBefore: formatHealthFactor(result.healthFactorBefore),
          healthFactorAfter: formatHealthFactor(result.healthFactorAfter),
        });
      }
    );
    return summary;
  }

  // ============================================================
  //                     READS (never mutate, read committed state)
  // ============================================================

  getAccountCollateralValue(user: string): bigint {
    return this.risk.totalCollateralValue(this.ledger, normalizeAddress(user, "user"));
  }

  /** Unregistered tokens simply report zero */
  getCollateralBalanceOfUser(user: string, token: string): bigint {
    return this.ledger.collateralOf(normalizeAddress(user, "user"), normalizeAddress(token, "token"));
  }

  getAccountInformation(user: string): AccountInformation {
    return this.risk.accountInformation(this.ledger, normalizeAddress(user, "user"));
  }

  getHealthFactor(user: string): bigint {
    return this.risk.healthFactor(this.ledger, normalizeAddress(user, "user"));
  }

  /** Additional debt `user` could mint right now without breaking health factor */
  getMintableAmount(user: string): bigint {
    return this.risk.maxMintable(this.ledger, normalizeAddress(user, "user"));
  }

  calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
    return calculateHealthFactor(totalDebt, collateralValueUsd);
  }

  getUsdValue(token: string, amount: bigint): bigint {
    return this.risk.valueOf(token, amount);
  }

  getTokenAmountFromUsd(token: string, usdAmount: bigint): bigint {
    return this.risk.amountFromUsd(token, usdAmount);
  }

  getCollateralTokens(): readonly string[] {
    return this.registry.tokens;
  }

  getCollateralTokenPriceFeed(token: string): string {
    return this.registry.feedOf(token);
  }

  getIssuedAsset(): string {
    return this.issuedAssetAddress;
  }

  getTotalDebt(): bigint {
    return this.ledger.totalDebt();
  }

  getTotalCollateralDeposited(token: string): bigint {
    return this.ledger.totalDeposited(normalizeAddress(token, "token"));
  }

  /** Committed ledger mutations, oldest first */
  getLedgerHistory(): readonly LedgerMutation[] {
    return this.ledger.history();
  }

  getPrecision(): bigint {
    return PRECISION;
  }

  getAdditionalFeedPrecision(): bigint {
    return ADDITIONAL_FEED_PRECISION;
  }

  getLiquidationThreshold(): bigint {
    return LIQUIDATION_THRESHOLD;
  }

  getLiquidationBonus(): bigint {
    return LIQUIDATION_BONUS;
  }

  getLiquidationPrecision(): bigint {
    return LIQUIDATION_PRECISION;
  }

  getMinHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }

  // ============================================================
  //                     STATE TRANSITIONS
  // ============================================================

  private depositCollateral(work: UnitOfWork, user: string, asset: string, amount: bigint): void {
    requirePositive(amount);
    const token = this.registry.resolve(asset);
    const owner = normalizeAddress(user, "user");
    const handle = this.tokenHandle(token);

    work.tx.increaseCollateral(owner, token, amount);
    work.notify({ name: "CollateralDeposited", payload: { user: owner, token, amount } });

    const label = `deposit ${token} from ${owner}`;
    work.settle(
      label,
      () => this.pull(handle, owner, amount, label),
      () => this.push(handle, owner, amount, `refund ${token} to ${owner}`)
    );
  }

  /** Debt is staged and checked before the mint request is queued */
  private mintDebt(work: UnitOfWork, user: string, amount: bigint): void {
    requirePositive(amount);
    const owner = normalizeAddress(user, "user");

    work.tx.increaseDebt(owner, amount);
    work.notify({ name: "DebtMinted", payload: { user: owner, amount } });
    this.risk.assertHealthy(work.tx, owner);

    work.release(`mint to ${owner}`, () => this.issue(owner, amount));
  }

  private redeemCollateral(
    work: UnitOfWork,
    token: string,
    amount: bigint,
    from: string,
    to: string
  ): void {
    const handle = this.tokenHandle(token);
    work.tx.decreaseCollateral(from, token, amount);
    work.notify({
      name: "CollateralRedeemed",
      payload: { redeemedFrom: from, redeemedTo: to, token, amount },
    });

    const label = `redeem ${token} to ${to}`;
    work.release(label, () => this.push(handle, to, amount, label));
  }

  /** `payer` funds the burn; `onBehalfOf` has their debt reduced */
  private burnDebt(work: UnitOfWork, amount: bigint, onBehalfOf: string, payer: string): void {
    work.tx.decreaseDebt(onBehalfOf, amount);
    work.notify({ name: "DebtBurned", payload: { onBehalfOf, payer, amount } });

    const pullLabel = `pull issued asset from ${payer}`;
    work.settle(
      pullLabel,
      () => this.pull(this.issuedAsset, payer, amount, pullLabel),
      () => this.push(this.issuedAsset, payer, amount, `refund issued asset to ${payer}`)
    );
    work.settle(
      "burn issued asset",
      () => this.destroy(amount),
      () => this.issue(this.address, amount)
    );
  }

  // ============================================================
  //                     EXECUTION
  // ============================================================

  /**
   * Run `body` under the guard and commit it. Committed bookkeeping
   * (`onCommitted`, metrics) happens before any listener runs, so a throwing
   * listener cannot skip it.
   */
  private execute<T>(
    operation: OperationName,
    body: (work: UnitOfWork) => T,
    onCommitted?: (result: T) => void
  ): T {
    const { work, result } = this.runGuarded(operation, body);

    operationsTotal.inc({ operation, status: "committed" });
    this.refreshGauges();
    onCommitted?.(result);
    this.deliver(operation, work.events);
    return result;
  }

  /** Emit every buffered event, then rethrow the first listener failure */
  private deliver(operation: OperationName, events: readonly EngineEvent[]): void {
    const outer = this.listenerFailures;
    const failures: unknown[] = [];
    this.listenerFailures = failures;
    try {
      for (const event of events) {
        this.emitter.emit(event.name, event.payload);
      }
    } finally {
      this.listenerFailures = outer;
    }
    if (failures.length > 0) {
      this.logger.error("Listener failed after commit", {
        operation,
        failures: failures.length,
        error: failures[0] instanceof Error ? failures[0].message : String(failures[0]),
      });
      throw failures[0];
    }
  }

  private runGuarded<T>(
    operation: OperationName,
    body: (work: UnitOfWork) => T
  ): { work: UnitOfWork; result: T } {
    if (this.active !== null) {
      operationsTotal.inc({ operation, status: "rejected" });
      throw new ReentrantCallError(operation, this.active);
    }

    this.active = operation;
    try {
      const work = new UnitOfWork(operation, this.ledger.begin(), this.logger);
      try {
        const result = body(work);
        work.executeInteractions();
        work.tx.commit();
        return { work, result };
      } catch (err) {
        operationsTotal.inc({ operation, status: "rejected" });
        if (work.hasCompletedSettles) {
          rollbacksTotal.inc({ operation });
        }
        this.logger.warn("Operation rejected", {
          operation,
          code: err instanceof EngineError ? err.code : "Unknown",
          error: err instanceof Error ? err.message : String(err),
        });
        return work.rollback(err);
      }
    } finally {
      this.active = null;
    }
  }

  private refreshGauges(): void {
    totalDebtGauge.set(toUnits(this.ledger.totalDebt()));
    for (const token of this.registry.tokens) {
      collateralDepositedGauge.set({ token }, toUnits(this.ledger.totalDeposited(token)));
    }
  }

  // ============================================================
  //                     INTERACTIONS
  // ============================================================

  private tokenHandle(token: string): TransferableToken {
    const handle = this.collateralTokens.get(token);
    if (!handle) {
      throw new AssetNotSupportedError(token);
    }
    return handle;
  }

  /** transferFrom `from` into custody */
  private pull(token: TransferableToken, from: string, amount: bigint, label: string): void {
    let ok: boolean;
    try {
      ok = token.transferFrom(from, this.address, amount);
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new TransferFailedError(label, { cause: err });
    }
    if (!ok) throw new TransferFailedError(label);
  }

  /** transfer out of custody to `to` */
  private push(token: TransferableToken, to: string, amount: bigint, label: string): void {
    let ok: boolean;
    try {
      ok = token.transfer(to, amount);
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new TransferFailedError(label, { cause: err });
    }
    if (!ok) throw new TransferFailedError(label);
  }

  private issue(to: string, amount: bigint): void {
    let ok: boolean;
    try {
      ok = this.issuedAsset.mint(to, amount);
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new MintFailedError(to, amount, { cause: err });
    }
    if (!ok) throw new MintFailedError(to, amount);
  }

  private destroy(amount: bigint): void {
    try {
      this.issuedAsset.burn(amount);
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new TransferFailedError(`burn ${amount} issued asset`, { cause: err });
    }
  }
}

function requirePositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new InvalidAmountError(amount);
  }
}
