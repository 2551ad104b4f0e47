import { getAddress, type Address } from "viem";
import { isEscrowError } from "../src/errors";
import { FeeHandler } from "../src/feeHandler";
import { Ratio } from "../src/fixedPoint";
import { Router, type CreateAuctionRequest, type RouterOptions } from "../src/router";
import { InMemoryTokenLedger } from "../src/tokenLedger";
import type { AuctionSchedule, ContractSignatureVerifier, OptionTerms } from "../src/types";
import { ManualClock } from "./mocks/manualClock";
import { MockOracle } from "./mocks/mockOracle";

export function addr(n: number): Address {
  return getAddress(`0x${n.toString(16).padStart(40, "0")}`);
}

/** The escrow error code thrown by fn, "unexpected" for any other throw, or null. */
export function codeOf(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return isEscrowError(error) ? error.code : "unexpected";
  }
  return null;
}

export async function asyncCodeOf(fn: () => Promise<unknown>): Promise<string | null> {
  try {
    await fn();
  } catch (error) {
    return isEscrowError(error) ? error.code : "unexpected";
  }
  return null;
}

export const DAY = 24 * 60 * 60;
export const T0 = 1_700_000_000;
export const WAD = 10n ** 18n;
export const USDC_UNIT = 10n ** 6n;

export const ADDR = {
  router: addr(0x100),
  routerOwner: addr(0x101),
  feeHandler: addr(0x102),
  feeOwner: addr(0x103),
  owner: addr(0x200),
  bidder: addr(0x201),
  receiver: addr(0x202),
  other: addr(0x203),
  distPartner: addr(0x204),
  weth: addr(0x300),
  usdc: addr(0x301),
  oracle: addr(0x400),
  registry: addr(0x500)
} as const;

/** 2000 USDC per WETH, and the inverse in WETH units. */
export const SPOT = 2000n * USDC_UNIT;
export const INVERSE_SPOT = WAD / 2000n;

export interface Market {
  ledger: InMemoryTokenLedger;
  clock: ManualClock;
  oracle: MockOracle;
  router: Router;
}

export function setupMarket(
  options: {
    contractSigners?: ContractSignatureVerifier;
    clock?: ManualClock;
    createRouter?: (options: RouterOptions) => Router;
  } = {}
): Market {
  const ledger = new InMemoryTokenLedger();
  ledger.registerToken({ address: ADDR.weth, symbol: "WETH", decimals: 18 });
  ledger.registerToken({ address: ADDR.usdc, symbol: "USDC", decimals: 6 });

  const clock = options.clock ?? new ManualClock(T0);
  const oracle = new MockOracle();
  oracle.setPrice(ADDR.weth, ADDR.usdc, SPOT);
  oracle.setPrice(ADDR.usdc, ADDR.weth, INVERSE_SPOT);

  const createRouter = options.createRouter ?? ((routerOptions: RouterOptions) => new Router(routerOptions));
  const router = createRouter({
    address: ADDR.router,
    owner: ADDR.routerOwner,
    chainId: 31337,
    ledger,
    clock,
    contractSigners: options.contractSigners
  });
  router.registerOracle(ADDR.oracle, oracle);

  return { ledger, clock, oracle, router };
}

export function feeHandlerWith(fees: { match?: string; exercise?: string; mint?: string }): FeeHandler {
  return new FeeHandler({
    address: ADDR.feeHandler,
    owner: ADDR.feeOwner,
    matchFee: Ratio.fromDecimal(fees.match ?? "0"),
    exerciseFee: Ratio.fromDecimal(fees.exercise ?? "0"),
    mintFee: Ratio.fromDecimal(fees.mint ?? "0")
  });
}

export function defaultSchedule(overrides: Partial<AuctionSchedule> = {}): AuctionSchedule {
  return {
    relStrike: Ratio.fromDecimal("1.2"),
    relPremiumStart: Ratio.fromDecimal("0.1"),
    relPremiumFloor: Ratio.fromDecimal("0.01"),
    decayStartTime: T0 + 100,
    decayDuration: 7 * DAY,
    minSpot: 1n,
    maxSpot: 10n ** 30n,
    tenor: 30 * DAY,
    earliestExerciseTenor: 7 * DAY,
    ...overrides
  };
}

export function auctionRequest(
  overrides: { schedule?: Partial<AuctionSchedule>; borrowCap?: string; premiumTokenIsUnderlying?: boolean } = {}
): CreateAuctionRequest {
  return {
    escrowOwner: ADDR.owner,
    distPartner: null,
    terms: {
      underlyingToken: ADDR.weth,
      settlementToken: ADDR.usdc,
      notional: 100n * WAD,
      advancedSettings: {
        borrowCap: Ratio.fromDecimal(overrides.borrowCap ?? "0"),
        oracle: ADDR.oracle,
        premiumTokenIsUnderlying: overrides.premiumTokenIsUnderlying ?? false,
        votingDelegationAllowed: false,
        allowedDelegateRegistry: null
      }
    },
    schedule: defaultSchedule(overrides.schedule)
  };
}

export function optionInfo(overrides: Partial<OptionTerms> = {}): OptionTerms {
  return {
    underlyingToken: ADDR.weth,
    settlementToken: ADDR.usdc,
    notional: 100n * WAD,
    strike: 2400n * USDC_UNIT,
    earliestExercise: T0,
    expiry: T0 + 30 * DAY,
    advancedSettings: {
      borrowCap: Ratio.fromDecimal("0.5"),
      oracle: ADDR.oracle,
      premiumTokenIsUnderlying: false,
      votingDelegationAllowed: false,
      allowedDelegateRegistry: null
    },
    ...overrides
  };
}

/** Creates a funded auction and matches it at relBid 0.1 right after creation. */
export function matchedAuction(
  market: Market,
  overrides: Parameters<typeof auctionRequest>[0] = {}
) {
  const request = auctionRequest(overrides);
  market.ledger.mint(ADDR.weth, ADDR.owner, request.terms.notional);
  const escrow = market.router.createAuction(ADDR.owner, request);
  market.ledger.mint(ADDR.usdc, ADDR.bidder, 1_000_000n * USDC_UNIT);
  market.router.bidOnAuction(ADDR.bidder, escrow.address, {
    optionReceiver: ADDR.bidder,
    relBid: Ratio.fromDecimal("0.1"),
    refSpot: SPOT,
    oracleData: "0x"
  });
  return escrow;
}
