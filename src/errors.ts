/**
 * Peg Engine - Error Types
 *
 * Every failure aborts the enclosing operation. Callers branch on `code`
 * (or on the subclass) rather than on message text.
 */

import { ethers } from "ethers";
import { MIN_HEALTH_FACTOR } from "./constants";

export type EngineErrorCode =
  | "InvalidAmount"
  | "AssetNotSupported"
  | "TransferFailed"
  | "InsufficientBalance"
  | "MintFailed"
  | "BreaksHealthFactor"
  | "HealthFactorOkay"
  | "HealthFactorNotImproved"
  | "OracleUnavailable"
  | "StalePrice"
  | "ReentrantCall"
  | "InvalidConfiguration"
  | "InvalidAddress"
  | "RollbackFailed";

// ============================================================
//                     BASE TYPE
// ============================================================

export class EngineError extends Error {
  constructor(
    public readonly code: EngineErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export function isEngineError(value: unknown, code?: EngineErrorCode): value is EngineError {
  return value instanceof EngineError && (code === undefined || value.code === code);
}

// ============================================================
//                     INPUT VALIDATION
// ============================================================

export class InvalidAmountError extends EngineError {
  constructor(public readonly amount: bigint) {
    super("InvalidAmount", `Amount must be greater than zero, got ${amount}`);
  }
}

export class AssetNotSupportedError extends EngineError {
  constructor(public readonly asset: string) {
    super("AssetNotSupported", `Asset ${asset} is not a registered collateral token`);
  }
}

export class InvalidAddressError extends EngineError {
  constructor(public readonly value: string, public readonly label: string) {
    super("InvalidAddress", `${label} is not a valid address: ${value.slice(0, 64)}`);
  }
}

export class InvalidConfigurationError extends EngineError {
  constructor(reason: string) {
    super("InvalidConfiguration", `Invalid engine configuration: ${reason}`);
  }
}

// ============================================================
//                     LEDGER & TRANSFERS
// ============================================================

export class InsufficientBalanceError extends EngineError {
  constructor(
    public readonly position: string,
    public readonly available: bigint,
    public readonly requested: bigint
  ) {
    super(
      "InsufficientBalance",
      `Cannot remove ${requested} from ${position}: only ${available} available`
    );
  }
}

export class TransferFailedError extends EngineError {
  constructor(public readonly label: string, options?: { cause?: unknown }) {
    super("TransferFailed", `Token transfer failed: ${label}`, options);
  }
}

export class MintFailedError extends EngineError {
  constructor(public readonly to: string, public readonly amount: bigint, options?: { cause?: unknown }) {
    super("MintFailed", `Issued-asset ledger declined mint of ${amount} to ${to}`, options);
  }
}

// ============================================================
//                     SOLVENCY
// ============================================================

export class BreaksHealthFactorError extends EngineError {
  constructor(public readonly user: string, public readonly healthFactor: bigint) {
    super(
      "BreaksHealthFactor",
      `Health factor of ${user} would be ${ethers.formatEther(healthFactor)} (minimum ${ethers.formatEther(MIN_HEALTH_FACTOR)})`
    );
  }
}

export class HealthFactorOkayError extends EngineError {
  constructor(public readonly user: string, public readonly healthFactor: bigint) {
    super("HealthFactorOkay", `${user} is not liquidatable (health factor ${ethers.formatEther(healthFactor)})`);
  }
}

export class HealthFactorNotImprovedError extends EngineError {
  constructor(
    public readonly user: string,
    public readonly before: bigint,
    public readonly after: bigint
  ) {
    super(
      "HealthFactorNotImproved",
      `Liquidation of ${user} did not improve health factor (${before} -> ${after})`
    );
  }
}

// ============================================================
//                     ORACLE
// ============================================================

export class OracleUnavailableError extends EngineError {
  constructor(public readonly feedId: string, reason: string, options?: { cause?: unknown }) {
    super("OracleUnavailable", `Price feed ${feedId} unavailable: ${reason}`, options);
  }
}

export class StalePriceError extends EngineError {
  constructor(public readonly feedId: string) {
    super("StalePrice", `Price feed ${feedId} returned a stale quote`);
  }
}

// ============================================================
//                     EXECUTION
// ============================================================

export class ReentrantCallError extends EngineError {
  constructor(public readonly operation: string, public readonly active: string) {
    super("ReentrantCall", `Re-entrant call to ${operation} while ${active} is in progress`);
  }
}

export class RollbackFailedError extends EngineError {
  constructor(
    public readonly operation: string,
    cause: unknown,
    public readonly failures: string[]
  ) {
    super(
      "RollbackFailed",
      `Rollback of ${operation} incomplete; compensation failed for: ${failures.join(", ")}`,
      { cause }
    );
  }
}
