/**
 * Peg Engine - Protocol Constants
 *
 * All values are fixed-point integers. Collateral amounts and debt use
 * 18 decimals; price feeds report 8 decimals and are scaled up by
 * ADDITIONAL_FEED_PRECISION before use.
 */

/** 1e18 fixed-point unit for USD values, debt and health factors */
export const PRECISION = 10n ** 18n;

/** Scales an 8-decimal feed answer up to 18 decimals */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Decimals every registered price feed must report */
export const FEED_DECIMALS = 8;

/** 50 / 100 of collateral value counts toward debt (a 200% minimum ratio) */
export const LIQUIDATION_THRESHOLD = 50n;
export const LIQUIDATION_PRECISION = 100n;

/** 10% of the seized amount is added on top for the liquidator */
export const LIQUIDATION_BONUS = 10n;

/** Health factor floor (1.0 in 1e18 terms) */
export const MIN_HEALTH_FACTOR = PRECISION;

/** Maximum tolerated feed age before a quote is stale (3 hours) */
export const DEFAULT_ORACLE_TIMEOUT_SECONDS = 3 * 60 * 60;
