/**
 * Peg Engine - Prometheus Metrics
 *
 * Metrics naming convention:  peg_engine_<metric>_<unit>
 *
 * Amount gauges are reported in whole units (18-decimal values divided by
 * 1e18) because Prometheus samples are doubles.
 */

import { Counter, Gauge, Registry } from "prom-client";
import { ethers } from "ethers";

// ============================================================
//  REGISTRY
// ============================================================

/** Registry shared by every engine in this process */
export const register: Registry = new Registry();

// ============================================================
//  COUNTERS
// ============================================================

export const operationsTotal = new Counter({
  name: "peg_engine_operations_total",
  help: "Public engine operations by outcome",
  labelNames: ["operation", "status"] as const, // status: committed | rejected
  registers: [register],
});

export const liquidationsTotal = new Counter({
  name: "peg_engine_liquidations_total",
  help: "Committed liquidations by seized collateral token",
  labelNames: ["token"] as const,
  registers: [register],
});

/** Operations whose external interactions had to be compensated */
export const rollbacksTotal = new Counter({
  name: "peg_engine_rollbacks_total",
  help: "Operations that compensated completed interactions after a failure",
  labelNames: ["operation"] as const,
  registers: [register],
});

// ============================================================
//  GAUGES
// ============================================================

export const totalDebtGauge = new Gauge({
  name: "peg_engine_total_debt",
  help: "Outstanding debt across all accounts (whole units)",
  registers: [register],
});

export const collateralDepositedGauge = new Gauge({
  name: "peg_engine_collateral_deposited",
  help: "Collateral held in custody per token (whole units)",
  labelNames: ["token"] as const,
  registers: [register],
});

// ============================================================
//  HELPERS
// ============================================================

/** 18-decimal fixed-point to a float for gauge samples */
export function toUnits(value: bigint): number {
  return Number(ethers.formatEther(value));
}
