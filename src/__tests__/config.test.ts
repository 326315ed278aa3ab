/**
 * Engine Configuration Tests
 * Environment parsing, dotenv files, and validation ordering
 */

import * as path from "path";
import { loadConfig, loadConfigFile, validateConfig, type EngineConfig } from "../config";
import { InvalidConfigurationError } from "../errors";

const ENGINE = "0x00000000000000000000000000000000000000e0";
const ISSUED = "0x0000000000000000000000000000000000001003";
const WETH = "0x0000000000000000000000000000000000001001";
const WBTC = "0x0000000000000000000000000000000000001002";
const ETH_FEED = "0x0000000000000000000000000000000000002001";
const BTC_FEED = "0x0000000000000000000000000000000000002002";

function validConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    engineAddress: ENGINE,
    issuedAssetAddress: ISSUED,
    collateralTokens: [WETH, WBTC],
    priceFeeds: [ETH_FEED, BTC_FEED],
    oracleTimeoutSeconds: 10800,
    ...overrides,
  };
}

describe("Engine Configuration", () => {
  describe("loadConfig", () => {
    it("should split comma-separated lists and trim entries", () => {
      const config = loadConfig({
        ENGINE_ADDRESS: ENGINE,
        ISSUED_ASSET_ADDRESS: ISSUED,
        COLLATERAL_TOKENS: ` ${WETH} ,${WBTC},`,
        PRICE_FEEDS: `${ETH_FEED},${BTC_FEED}`,
        ORACLE_TIMEOUT_SECONDS: "600",
      });
      expect(config).toEqual({
        engineAddress: ENGINE,
        issuedAssetAddress: ISSUED,
        collateralTokens: [WETH, WBTC],
        priceFeeds: [ETH_FEED, BTC_FEED],
        oracleTimeoutSeconds: 600,
      });
    });

    it("should fall back to defaults", () => {
      const config = loadConfig({});
      expect(config.engineAddress).toBe("");
      expect(config.collateralTokens).toEqual([]);
      expect(config.oracleTimeoutSeconds).toBe(10800);
    });

    it("should fall back to the default timeout for a non-numeric value", () => {
      expect(loadConfig({ ORACLE_TIMEOUT_SECONDS: "soon" }).oracleTimeoutSeconds).toBe(10800);
    });
  });

  describe("loadConfigFile", () => {
    it("should parse a dotenv file without touching process.env", () => {
      const before = process.env.ENGINE_ADDRESS;
      const config = loadConfigFile(path.join(__dirname, "..", "..", "test", "fixtures", "engine.env"));

      expect(config.engineAddress).toBe(ENGINE);
      expect(config.issuedAssetAddress).toBe(ISSUED);
      expect(config.collateralTokens).toEqual([WETH, WBTC]);
      expect(config.priceFeeds).toEqual([ETH_FEED, BTC_FEED]);
      expect(config.oracleTimeoutSeconds).toBe(3600);
      expect(process.env.ENGINE_ADDRESS).toBe(before);
      expect(() => validateConfig(config)).not.toThrow();
    });
  });

  describe("validateConfig", () => {
    it("should accept a complete configuration", () => {
      expect(() => validateConfig(validConfig())).not.toThrow();
    });

    it("should require the engine address", () => {
      expect(() => validateConfig(validConfig({ engineAddress: "" }))).toThrow("ENGINE_ADDRESS");
    });

    it("should require the issued asset address", () => {
      expect(() => validateConfig(validConfig({ issuedAssetAddress: "0xabc" }))).toThrow(
        "ISSUED_ASSET_ADDRESS"
      );
    });

    it("should require at least one collateral token", () => {
      expect(() => validateConfig(validConfig({ collateralTokens: [], priceFeeds: [] }))).toThrow(
        "at least one token"
      );
    });

    it("should require one feed per token", () => {
      expect(() => validateConfig(validConfig({ priceFeeds: [ETH_FEED] }))).toThrow("same length");
    });

    it("should reject a malformed token", () => {
      expect(() => validateConfig(validConfig({ collateralTokens: [WETH, "wbtc"] }))).toThrow(
        "COLLATERAL_TOKENS[1]"
      );
    });

    it("should reject a token listed twice", () => {
      expect(() => validateConfig(validConfig({ collateralTokens: [WETH, WETH] }))).toThrow(
        "more than once"
      );
    });

    it("should reject a zero-address feed", () => {
      expect(() =>
        validateConfig(
          validConfig({ priceFeeds: [ETH_FEED, "0x0000000000000000000000000000000000000000"] })
        )
      ).toThrow("PRICE_FEEDS[1]");
    });

    it("should reject a non-integer timeout", () => {
      expect(() => validateConfig(validConfig({ oracleTimeoutSeconds: 1.5 }))).toThrow(
        InvalidConfigurationError
      );
    });
  });
});
