/**
 * Peg Engine - Shared Types
 *
 * Capabilities consumed from external collaborators and the shapes the
 * engine exposes to callers.
 */

// ============================================================
//                     COLLABORATORS
// ============================================================

/**
 * Token handle acting on behalf of the engine's custody address.
 * `transferFrom` spends an allowance the `from` account granted the engine.
 */
export interface TransferableToken {
  transfer(to: string, amount: bigint): boolean;
  transferFrom(from: string, to: string, amount: bigint): boolean;
}

/** Ledger of the issued (pegged) asset. The engine holds mint/burn rights. */
export interface IssuedAssetLedger extends TransferableToken {
  mint(to: string, amount: bigint): boolean;
  /** Burns `amount` from the engine's own balance */
  burn(amount: bigint): void;
}

/** Resolves the token handle for a registered collateral asset */
export interface TokenDirectory {
  tokenAt(asset: string): TransferableToken;
}

/** Chainlink-style round data */
export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface AggregatorV3Interface {
  decimals(): number;
  latestRoundData(): RoundData;
}

/** Resolves the aggregator behind a configured price feed address */
export interface FeedDirectory {
  aggregatorAt(feedId: string): AggregatorV3Interface;
}

export interface PriceQuote {
  /** Feed answer, 8 decimals */
  price: bigint;
  isStale: boolean;
}

export interface PriceOracle {
  latestPrice(feedId: string): PriceQuote;
}

// ============================================================
//                     ENGINE SURFACE
// ============================================================

export type OperationName =
  | "deposit"
  | "mint"
  | "depositAndMint"
  | "redeem"
  | "burn"
  | "redeemForBurn"
  | "liquidate";

export interface AccountInformation {
  /** Outstanding debt (18 decimals) */
  totalDebt: bigint;
  /** Collateral value in USD (18 decimals) */
  collateralValueUsd: bigint;
}

export interface SeizeAmount {
  base: bigint;
  bonus: bigint;
  total: bigint;
}

export interface EngineEvents {
  CollateralDeposited: { user: string; token: string; amount: bigint };
  CollateralRedeemed: { redeemedFrom: string; redeemedTo: string; token: string; amount: bigint };
  DebtMinted: { user: string; amount: bigint };
  DebtBurned: { onBehalfOf: string; payer: string; amount: bigint };
  Liquidated: {
    liquidator: string;
    user: string;
    token: string;
    debtCovered: bigint;
    collateralSeized: bigint;
    bonus: bigint;
    healthFactorBefore: bigint;
    healthFactorAfter: bigint;
  };
}

export type EngineEventName = keyof EngineEvents;

export type EngineEvent = {
  [K in EngineEventName]: { name: K; payload: EngineEvents[K] };
}[EngineEventName];
