/**
 * Asset Registry Unit Tests
 */

import { ethers } from "ethers";
import { AssetNotSupportedError, InvalidAddressError, InvalidConfigurationError } from "../errors";
import { AssetRegistry } from "../registry";
import { addr } from "../../test/helpers/mocks";

const WETH = addr(0x1001);
const WBTC = addr(0x1002);
const ETH_FEED = addr(0x2001);
const BTC_FEED = addr(0x2002);

describe("AssetRegistry", () => {
  it("should keep tokens in registration order", () => {
    const registry = new AssetRegistry([WBTC, WETH], [BTC_FEED, ETH_FEED]);
    expect(registry.tokens).toEqual([WBTC, WETH]);
    expect(Object.isFrozen(registry.tokens)).toBe(true);
  });

  it("should map each token to its feed", () => {
    const registry = new AssetRegistry([WETH, WBTC], [ETH_FEED, BTC_FEED]);
    expect(registry.feedOf(WETH)).toBe(ETH_FEED);
    expect(registry.feedOf(WBTC)).toBe(BTC_FEED);
  });

  it("should resolve addresses case-insensitively", () => {
    const registry = new AssetRegistry([WETH.toLowerCase()], [ETH_FEED]);
    expect(registry.has(WETH)).toBe(true);
    expect(registry.resolve(WETH.toLowerCase())).toBe(WETH);
  });

  it("should reject unregistered and malformed assets", () => {
    const registry = new AssetRegistry([WETH], [ETH_FEED]);
    expect(registry.has(WBTC)).toBe(false);
    expect(registry.has("not-an-address")).toBe(false);
    expect(() => registry.resolve(WBTC)).toThrow(AssetNotSupportedError);
    expect(() => registry.feedOf("not-an-address")).toThrow(AssetNotSupportedError);
  });

  describe("construction", () => {
    it("should reject mismatched list lengths", () => {
      expect(() => new AssetRegistry([WETH, WBTC], [ETH_FEED])).toThrow(InvalidConfigurationError);
    });

    it("should reject an empty token list", () => {
      expect(() => new AssetRegistry([], [])).toThrow(InvalidConfigurationError);
    });

    it("should reject a zero-address feed", () => {
      expect(() => new AssetRegistry([WETH], [ethers.ZeroAddress])).toThrow(InvalidConfigurationError);
    });

    it("should reject a duplicate token", () => {
      expect(() => new AssetRegistry([WETH, WETH.toLowerCase()], [ETH_FEED, BTC_FEED])).toThrow(
        "listed twice"
      );
    });

    it("should reject a malformed token address", () => {
      expect(() => new AssetRegistry(["0x1234"], [ETH_FEED])).toThrow(InvalidAddressError);
    });
  });
});
