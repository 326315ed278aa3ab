/**
 * Peg Engine - Calculator Utilities
 *
 * Pure fixed-point math for valuation, health factor, and liquidation sizing.
 * No I/O; shared by the risk engine and tests.
 * All divisions truncate toward zero, matching on-chain integer semantics.
 */

import { ethers } from "ethers";
import {
  ADDITIONAL_FEED_PRECISION,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  PRECISION,
} from "./constants";
import type { SeizeAmount } from "./types";

/**
 * USD value of a token amount.
 * @param price   Feed answer (8 decimals)
 * @param amount  Token amount (18 decimals)
 * @returns USD value (18 decimals)
 */
export function calculateUsdValue(price: bigint, amount: bigint): bigint {
  return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
}

/**
 * Token amount worth `usdAmount` at `price`. Inverse of calculateUsdValue.
 */
export function calculateTokenAmountFromUsd(price: bigint, usdAmount: bigint): bigint {
  return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
}

/**
 * Health factor for a position.
 * @returns 1e18-scaled ratio; MaxUint256 when there is no debt
 */
export function calculateHealthFactor(totalDebt: bigint, collateralValueUsd: bigint): bigint {
  if (totalDebt === 0n) return ethers.MaxUint256;
  const adjustedCollateral = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjustedCollateral * PRECISION) / totalDebt;
}

/**
 * Collateral a liquidator receives for covering `debtToCover` USD of debt:
 * the equivalent token amount plus the liquidation bonus.
 */
export function calculateSeizeAmount(price: bigint, debtToCover: bigint): SeizeAmount {
  const base = calculateTokenAmountFromUsd(price, debtToCover);
  const bonus = (base * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
  return { base, bonus, total: base + bonus };
}

/**
 * Additional debt a position can take on while staying at health factor >= 1.
 */
export function calculateMaxMintable(collateralValueUsd: bigint, totalDebt: bigint): bigint {
  const ceiling = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return ceiling > totalDebt ? ceiling - totalDebt : 0n;
}
