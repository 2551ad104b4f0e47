import { getAddress, isAddressEqual, zeroAddress, type Address, type Hex } from "viem";
import { fail, mulDiv, pow10, type Clock, type OracleAdapter } from "@strikehouse/matching";
import type { PriceFeed } from "./priceFeed";

const USD_DECIMALS = 18;

export interface FeedRegistration {
  token: Address;
  feed: PriceFeed;
}

export interface FeedOracleOptions {
  feeds: readonly FeedRegistration[];
  maxStalenessSeconds: number;
  clock: Clock;
  decimalsOf: (token: Address) => number;
}

/**
 * Prices any registered token against any other through their USD feeds:
 * price(base, quote) = usd(base) * 10^quoteDecimals / usd(quote).
 */
export class FeedOracleAdapter implements OracleAdapter {
  private feeds = new Map<Address, PriceFeed>();
  private readonly maxStalenessSeconds: number;
  private readonly clock: Clock;
  private readonly decimalsOf: (token: Address) => number;

  constructor(options: FeedOracleOptions) {
    if (!Number.isInteger(options.maxStalenessSeconds) || options.maxStalenessSeconds <= 0) {
      fail("InvalidOracle", "Max staleness must be a positive number of seconds");
    }
    this.maxStalenessSeconds = options.maxStalenessSeconds;
    this.clock = options.clock;
    this.decimalsOf = options.decimalsOf;
    for (const { token, feed } of options.feeds) {
      this.addFeed(token, feed);
    }
  }

  addFeed(token: Address, feed: PriceFeed): void {
    if (isAddressEqual(token, zeroAddress)) {
      fail("InvalidAddress", "Feed token cannot be the zero address");
    }
    const key = getAddress(token);
    if (this.feeds.has(key)) {
      fail("OracleAlreadySet", `Feed already registered for ${key}`);
    }
    this.feeds.set(key, feed);
  }

  hasFeed(token: Address): boolean {
    return this.feeds.has(getAddress(token));
  }

  /** USD price of one whole token, scaled to 18 decimals. */
  getPriceOfToken(token: Address): bigint {
    const feed = this.feeds.get(getAddress(token));
    if (!feed) {
      return fail("NoOracle", `No feed for ${token}`);
    }
    const round = feed.latestRoundData();
    if (round.roundId === 0n || round.answer <= 0n) {
      fail("InvalidOracleAnswer", `Invalid answer from feed for ${token}`, {
        roundId: round.roundId.toString(),
        answer: round.answer.toString()
      });
    }
    const age = this.clock.now() - round.updatedAt;
    if (age > this.maxStalenessSeconds) {
      fail("StaleOracleAnswer", `Feed for ${token} is ${age}s old`, { updatedAt: round.updatedAt });
    }
    if (feed.decimals <= USD_DECIMALS) {
      return round.answer * pow10(USD_DECIMALS - feed.decimals);
    }
    return round.answer / pow10(feed.decimals - USD_DECIMALS);
  }

  getPrice(base: Address, quote: Address, _oracleData: Hex): bigint {
    const basePrice = this.getPriceOfToken(base);
    const quotePrice = this.getPriceOfToken(quote);
    return mulDiv(basePrice, pow10(this.decimalsOf(quote)), quotePrice);
  }
}
