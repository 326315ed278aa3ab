/**
 * Peg Engine - Price Oracle Adapter
 *
 * Wraps Chainlink-style aggregators behind the PriceOracle capability.
 *
 * Staleness rules (any one marks the quote stale):
 *   - updatedAt == 0            (round never completed)
 *   - answeredInRound < roundId (answer carried over from an older round)
 *   - now - updatedAt > timeout (heartbeat missed)
 *
 * The adapter only reports staleness; the risk engine decides that a stale
 * quote is fatal.
 */

import type { Logger } from "winston";
import { DEFAULT_ORACLE_TIMEOUT_SECONDS, FEED_DECIMALS } from "./constants";
import { InvalidConfigurationError, OracleUnavailableError } from "./errors";
import { createModuleLogger } from "./logger";
import type { AggregatorV3Interface, PriceOracle, PriceQuote, RoundData } from "./types";
import { normalizeAddress } from "./utils";

export interface StaleCheckedOracleOptions {
  /** Maximum feed age in seconds (default: 3 hours) */
  timeoutSeconds?: number;
  /** Current time in unix seconds */
  now?: () => number;
  logger?: Logger;
}

const systemClock = (): number => Math.floor(Date.now() / 1000);

/**
 * True when the round is stale at `now` for the given timeout.
 */
export function isRoundStale(round: RoundData, now: number, timeoutSeconds: number): boolean {
  if (round.updatedAt === 0n) return true;
  if (round.answeredInRound < round.roundId) return true;
  return BigInt(now) - round.updatedAt > BigInt(timeoutSeconds);
}

export class StaleCheckedOracle implements PriceOracle {
  private readonly feeds = new Map<string, AggregatorV3Interface>();
  private readonly timeoutSeconds: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: StaleCheckedOracleOptions = {}) {
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_ORACLE_TIMEOUT_SECONDS;
    if (!(this.timeoutSeconds > 0)) {
      throw new InvalidConfigurationError(`oracle timeout must be positive, got ${this.timeoutSeconds}`);
    }
    this.now = options.now ?? systemClock;
    this.logger = options.logger ?? createModuleLogger("Oracle");
  }

  /** Register an aggregator under its feed address */
  addFeed(feedId: string, aggregator: AggregatorV3Interface): this {
    const id = normalizeAddress(feedId, "price feed");
    const decimals = aggregator.decimals();
    if (decimals !== FEED_DECIMALS) {
      throw new InvalidConfigurationError(
        `feed ${id} reports ${decimals} decimals; expected ${FEED_DECIMALS}`
      );
    }
    this.feeds.set(id, aggregator);
    return this;
  }

  latestPrice(feedId: string): PriceQuote {
    const id = normalizeAddress(feedId, "price feed");
    const aggregator = this.feeds.get(id);
    if (!aggregator) {
      throw new OracleUnavailableError(id, "no aggregator registered");
    }

    let round: RoundData;
    try {
      round = aggregator.latestRoundData();
    } catch (err) {
      throw new OracleUnavailableError(id, "latestRoundData failed", { cause: err });
    }

    if (round.answer <= 0n) {
      throw new OracleUnavailableError(id, `non-positive answer ${round.answer}`);
    }

    const isStale = isRoundStale(round, this.now(), this.timeoutSeconds);
    if (isStale) {
      this.logger.warn("Stale price quote", {
        feed: id,
        roundId: round.roundId.toString(),
        updatedAt: round.updatedAt.toString(),
        timeoutSeconds: this.timeoutSeconds,
      });
    }
    return { price: round.answer, isStale };
  }
}
