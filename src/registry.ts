/**
 * Peg Engine - Asset Registry
 *
 * Ordered, immutable mapping of collateral token → price feed, fixed at
 * construction. Iteration order is the order tokens were supplied.
 */

import { ethers } from "ethers";
import { AssetNotSupportedError, InvalidConfigurationError } from "./errors";
import { normalizeAddress } from "./utils";

export class AssetRegistry {
  private readonly feeds = new Map<string, string>();
  private readonly ordered: readonly string[];

  constructor(tokenAddresses: readonly string[], priceFeedAddresses: readonly string[]) {
    if (tokenAddresses.length !== priceFeedAddresses.length) {
      throw new InvalidConfigurationError(
        `token and price feed lists must be the same length (${tokenAddresses.length} != ${priceFeedAddresses.length})`
      );
    }
    if (tokenAddresses.length === 0) {
      throw new InvalidConfigurationError("at least one collateral token is required");
    }

    tokenAddresses.forEach((rawToken, i) => {
      const token = normalizeAddress(rawToken, `collateral token #${i}`);
      const feed = normalizeAddress(priceFeedAddresses[i], `price feed #${i}`);
      if (feed === ethers.ZeroAddress) {
        throw new InvalidConfigurationError(`price feed for ${token} is the zero address`);
      }
      if (this.feeds.has(token)) {
        throw new InvalidConfigurationError(`collateral token ${token} listed twice`);
      }
      this.feeds.set(token, feed);
    });
    this.ordered = Object.freeze([...this.feeds.keys()]);
  }

  /** Registered tokens in registration order */
  get tokens(): readonly string[] {
    return this.ordered;
  }

  has(asset: string): boolean {
    return ethers.isAddress(asset) && this.feeds.has(ethers.getAddress(asset));
  }

  /**
   * Normalised token address for a registered asset.
   * Throws AssetNotSupportedError otherwise.
   */
  resolve(asset: string): string {
    if (!this.has(asset)) {
      throw new AssetNotSupportedError(asset);
    }
    return ethers.getAddress(asset);
  }

  feedOf(asset: string): string {
    const feed = this.feeds.get(this.resolve(asset));
    if (feed === undefined) {
      throw new AssetNotSupportedError(asset);
    }
    return feed;
  }
}
