// Peg Engine - public entry point

export * from "./constants";
export * from "./errors";
export * from "./types";
export * from "./calculator";
export { AssetRegistry } from "./registry";
export { PositionLedger, LedgerTransaction } from "./ledger";
export type { PositionReader, LedgerMutation } from "./ledger";
export { StaleCheckedOracle, isRoundStale } from "./oracle";
export type { StaleCheckedOracleOptions } from "./oracle";
export { RiskEngine } from "./risk-engine";
export { UnitOfWork } from "./unit-of-work";
export { PegEngine } from "./engine";
export type {
  EngineParams,
  EngineDeps,
  EngineOptions,
  ConfiguredEngineDeps,
  ConfiguredEngineOptions,
  LiquidationResult,
} from "./engine";
export { loadConfig, loadConfigFile, validateConfig } from "./config";
export type { EngineConfig } from "./config";
export { createModuleLogger } from "./logger";
export * as metrics from "./metrics";
export { normalizeAddress, formatHealthFactor } from "./utils";
