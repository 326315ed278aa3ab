/**
 * Peg Engine - Risk Engine
 *
 * Values collateral and computes health factors from a PositionReader plus
 * live oracle quotes. Public reads pass the committed ledger; operations pass
 * their staged transaction so checks see the post-operation state.
 *
 * A stale or missing quote is fatal to whatever called in here.
 */

import type { Logger } from "winston";
import {
  calculateHealthFactor,
  calculateMaxMintable,
  calculateSeizeAmount,
  calculateTokenAmountFromUsd,
  calculateUsdValue,
} from "./calculator";
import { MIN_HEALTH_FACTOR } from "./constants";
import {
  BreaksHealthFactorError,
  EngineError,
  OracleUnavailableError,
  StalePriceError,
} from "./errors";
import type { PositionReader } from "./ledger";
import { createModuleLogger } from "./logger";
import type { AssetRegistry } from "./registry";
import type { AccountInformation, PriceOracle, PriceQuote, SeizeAmount } from "./types";
import { formatHealthFactor } from "./utils";

export class RiskEngine {
  private readonly logger: Logger;

  constructor(
    private readonly registry: AssetRegistry,
    private readonly oracle: PriceOracle,
    logger?: Logger
  ) {
    this.logger = logger ?? createModuleLogger("RiskEngine");
  }

  /** Fresh feed answer for a registered asset (8 decimals) */
  priceOf(asset: string): bigint {
    const feed = this.registry.feedOf(asset);

    let quote: PriceQuote;
    try {
      quote = this.oracle.latestPrice(feed);
    } catch (err) {
      if (err instanceof EngineError) throw err;
      throw new OracleUnavailableError(feed, "oracle call failed", { cause: err });
    }

    if (quote.isStale) {
      throw new StalePriceError(feed);
    }
    if (quote.price <= 0n) {
      throw new OracleUnavailableError(feed, `non-positive price ${quote.price}`);
    }
    return quote.price;
  }

  /** USD value (18 decimals) of `amount` of `asset` */
  valueOf(asset: string, amount: bigint): bigint {
    return calculateUsdValue(this.priceOf(asset), amount);
  }

  /** Amount of `asset` worth `usdAmount` */
  amountFromUsd(asset: string, usdAmount: bigint): bigint {
    return calculateTokenAmountFromUsd(this.priceOf(asset), usdAmount);
  }

  seizeAmount(asset: string, debtToCover: bigint): SeizeAmount {
    return calculateSeizeAmount(this.priceOf(asset), debtToCover);
  }

  /**
   * Sum of USD values over every registered asset. Zero balances are skipped,
   * so an account holding nothing never touches the oracle.
   */
  totalCollateralValue(positions: PositionReader, user: string): bigint {
    let total = 0n;
    for (const asset of this.registry.tokens) {
      const amount = positions.collateralOf(user, asset);
      if (amount === 0n) continue;
      total += this.valueOf(asset, amount);
    }
    return total;
  }

  accountInformation(positions: PositionReader, user: string): AccountInformation {
    return {
      totalDebt: positions.debtOf(user),
      collateralValueUsd: this.totalCollateralValue(positions, user),
    };
  }

  /** Debt-free accounts are maximally healthy without consulting prices */
  healthFactor(positions: PositionReader, user: string): bigint {
    const totalDebt = positions.debtOf(user);
    if (totalDebt === 0n) return calculateHealthFactor(0n, 0n);
    return calculateHealthFactor(totalDebt, this.totalCollateralValue(positions, user));
  }

  maxMintable(positions: PositionReader, user: string): bigint {
    const { totalDebt, collateralValueUsd } = this.accountInformation(positions, user);
    return calculateMaxMintable(collateralValueUsd, totalDebt);
  }

  /** Single enforcement point for solvency */
  assertHealthy(positions: PositionReader, user: string): void {
    const healthFactor = this.healthFactor(positions, user);
    this.logger.debug("Health check", { user, healthFactor: formatHealthFactor(healthFactor) });
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new BreaksHealthFactorError(user, healthFactor);
    }
  }
}
