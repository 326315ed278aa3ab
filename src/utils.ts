/**
 * Shared utilities for the peg engine
 */

import { ethers } from "ethers";
import { InvalidAddressError } from "./errors";

/**
 * Checksum-normalise an address so map keys compare case-insensitively.
 * Throws InvalidAddressError for anything ethers does not accept.
 */
export function normalizeAddress(value: string, label: string): string {
  if (!ethers.isAddress(value)) {
    throw new InvalidAddressError(value, label);
  }
  return ethers.getAddress(value);
}

/** Render a 1e18 health factor for logs ("∞" when the account has no debt) */
export function formatHealthFactor(healthFactor: bigint): string {
  if (healthFactor === ethers.MaxUint256) return "∞";
  return ethers.formatEther(healthFactor);
}
