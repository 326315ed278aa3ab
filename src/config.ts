/**
 * Peg Engine - Configuration
 *
 * Reads engine wiring from environment variables. Collateral tokens and
 * their price feeds are paired by position:
 *
 *   COLLATERAL_TOKENS=0xWeth,0xWbtc
 *   PRICE_FEEDS=0xEthUsdFeed,0xBtcUsdFeed
 */

import * as fs from "fs";
import * as dotenv from "dotenv";
import { ethers } from "ethers";
import { DEFAULT_ORACLE_TIMEOUT_SECONDS } from "./constants";
import { InvalidConfigurationError } from "./errors";

export interface EngineConfig {
  /** Custody address the engine acts as */
  engineAddress: string;
  /** Issued-asset ledger address */
  issuedAssetAddress: string;
  /** Collateral token addresses, in registry order */
  collateralTokens: string[];
  /** Price feed per collateral token, same order */
  priceFeeds: string[];
  /** Maximum feed age before a quote is stale */
  oracleTimeoutSeconds: number;
}

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Build a config from environment variables. Does not validate; call
 * validateConfig before wiring an engine.
 */
export function loadConfig(env: Env = process.env): EngineConfig {
  return {
    engineAddress: env.ENGINE_ADDRESS || "",
    issuedAssetAddress: env.ISSUED_ASSET_ADDRESS || "",
    collateralTokens: parseList(env.COLLATERAL_TOKENS),
    priceFeeds: parseList(env.PRICE_FEEDS),
    oracleTimeoutSeconds: Number(env.ORACLE_TIMEOUT_SECONDS) || DEFAULT_ORACLE_TIMEOUT_SECONDS,
  };
}

/**
 * Load a dotenv-format file without touching process.env.
 */
export function loadConfigFile(filePath: string): EngineConfig {
  const parsed = dotenv.parse(fs.readFileSync(filePath, "utf-8"));
  return loadConfig(parsed);
}

/**
 * Validate that required configuration is present and consistent.
 * Throws InvalidConfigurationError on the first problem found.
 */
export function validateConfig(config: EngineConfig): void {
  if (!ethers.isAddress(config.engineAddress)) {
    throw new InvalidConfigurationError("ENGINE_ADDRESS is missing or not a valid address");
  }
  if (!ethers.isAddress(config.issuedAssetAddress)) {
    throw new InvalidConfigurationError("ISSUED_ASSET_ADDRESS is missing or not a valid address");
  }
  if (config.collateralTokens.length === 0) {
    throw new InvalidConfigurationError("COLLATERAL_TOKENS must list at least one token");
  }
  if (config.collateralTokens.length !== config.priceFeeds.length) {
    throw new InvalidConfigurationError(
      `COLLATERAL_TOKENS (${config.collateralTokens.length}) and PRICE_FEEDS (${config.priceFeeds.length}) must be the same length`
    );
  }

  const seen = new Set<string>();
  config.collateralTokens.forEach((token, i) => {
    if (!ethers.isAddress(token)) {
      throw new InvalidConfigurationError(`COLLATERAL_TOKENS[${i}] is not a valid address`);
    }
    const normalized = ethers.getAddress(token);
    if (seen.has(normalized)) {
      throw new InvalidConfigurationError(`COLLATERAL_TOKENS lists ${normalized} more than once`);
    }
    seen.add(normalized);

    const feed = config.priceFeeds[i];
    if (!ethers.isAddress(feed) || ethers.getAddress(feed) === ethers.ZeroAddress) {
      throw new InvalidConfigurationError(`PRICE_FEEDS[${i}] is not a valid feed address`);
    }
  });

  if (!Number.isInteger(config.oracleTimeoutSeconds) || config.oracleTimeoutSeconds <= 0) {
    throw new InvalidConfigurationError("ORACLE_TIMEOUT_SECONDS must be a positive integer");
  }
}
