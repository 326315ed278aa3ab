/**
 * Shared engine fixture: two collateral tokens (WETH, WBTC), an issued
 * asset, Chainlink-style feeds and a manual clock.
 */

import { ethers } from "ethers";
import { PegEngine } from "../../src/engine";
import { StaleCheckedOracle } from "../../src/oracle";
import { ManualClock, MockERC20, MockTokenDirectory, MockV3Aggregator, addr } from "./mocks";

export const ETH_USD_PRICE = 2000n * 10n ** 8n; // $2000, 8 decimals
export const BTC_USD_PRICE = 1000n * 10n ** 8n; // $1000, 8 decimals
export const START_TIME = 1_700_000_000;

export const ENGINE_ADDRESS = addr(0xe0);
export const ETH_FEED_ADDRESS = addr(0x2001);
export const BTC_FEED_ADDRESS = addr(0x2002);

export const STARTING_WETH = ethers.parseEther("10");
export const LIQUIDATOR_WETH = ethers.parseEther("100");

export function deployEngineFixture() {
  const clock = new ManualClock(START_TIME);

  const weth = new MockERC20("Wrapped Ether", "WETH", addr(0x1001));
  const wbtc = new MockERC20("Wrapped Bitcoin", "WBTC", addr(0x1002));
  const issued = new MockERC20("Peg USD", "PUSD", addr(0x1003));

  const ethFeed = new MockV3Aggregator(8, ETH_USD_PRICE, clock);
  const btcFeed = new MockV3Aggregator(8, BTC_USD_PRICE, clock);
  const oracle = new StaleCheckedOracle({ now: () => clock.now() })
    .addFeed(ETH_FEED_ADDRESS, ethFeed)
    .addFeed(BTC_FEED_ADDRESS, btcFeed);

  const engine = new PegEngine(
    {
      engineAddress: ENGINE_ADDRESS,
      issuedAssetAddress: issued.address,
      tokenAddresses: [weth.address, wbtc.address],
      priceFeedAddresses: [ETH_FEED_ADDRESS, BTC_FEED_ADDRESS],
    },
    {
      issuedAsset: issued.connect(ENGINE_ADDRESS),
      tokens: new MockTokenDirectory([weth, wbtc], ENGINE_ADDRESS),
      oracle,
    }
  );

  const user = addr(0xa1);
  const user2 = addr(0xa2);
  const liquidator = addr(0xa3);

  weth.mint(user, STARTING_WETH);
  weth.mint(user2, STARTING_WETH);
  weth.mint(liquidator, LIQUIDATOR_WETH);
  wbtc.mint(user, STARTING_WETH);

  return { engine, oracle, clock, weth, wbtc, issued, ethFeed, btcFeed, user, user2, liquidator };
}

export type EngineFixture = ReturnType<typeof deployEngineFixture>;

/** Approve and deposit `amount` of `token` for `account` */
export function depositCollateral(
  fx: EngineFixture,
  account: string,
  token: MockERC20,
  amount: bigint
): void {
  token.connect(account).approve(fx.engine.address, amount);
  fx.engine.deposit(account, token.address, amount);
}

/** Approve and deposit WETH, then mint `debt` in one call */
export function depositAndMint(fx: EngineFixture, account: string, collateral: bigint, debt: bigint): void {
  fx.weth.connect(account).approve(fx.engine.address, collateral);
  fx.engine.depositAndMint(account, fx.weth.address, collateral, debt);
}

/** Approve the engine to pull `amount` of the issued asset from `account` */
export function approveIssued(fx: EngineFixture, account: string, amount: bigint): void {
  fx.issued.connect(account).approve(fx.engine.address, amount);
}
