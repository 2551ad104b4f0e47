import { describe, it, expect, vi } from "vitest";
import { getAddress } from "viem";
import { isEscrowError } from "@strikehouse/matching";
import { HttpPriceFeed, ManualPriceFeed, type FetchLike } from "../src/priceFeed";
import { InMemoryDelegationRegistry } from "../src/delegationRegistry";

const T0 = 1_700_000_000;
const FEED_URL = "http://prices.test/weth-usd";

function response(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

describe("ManualPriceFeed", () => {
  it("advances the round on each answer", () => {
    const feed = new ManualPriceFeed(8, 100n, T0);
    expect(feed.latestRoundData()).toEqual({ roundId: 1n, answer: 100n, updatedAt: T0 });
    expect(feed.setAnswer(120n, T0 + 60)).toEqual({ roundId: 2n, answer: 120n, updatedAt: T0 + 60 });
  });
});

describe("HttpPriceFeed", () => {
  it("has no answer before the first refresh", () => {
    const feed = new HttpPriceFeed({ url: FEED_URL, decimals: 8, fetchImpl: vi.fn<FetchLike>() });
    let code: string | null = null;
    try {
      feed.latestRoundData();
    } catch (error) {
      code = isEscrowError(error) ? error.code : "unexpected";
    }
    expect(code).toBe("InvalidOracleAnswer");
  });

  it("stores each fetched price as a new round", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(response({ price: "200000000000", updatedAt: T0 }))
      .mockResolvedValueOnce(response({ price: 210000000000, updatedAt: T0 + 30 }));
    const feed = new HttpPriceFeed({ url: FEED_URL, decimals: 8, fetchImpl });

    await feed.refresh();
    expect(feed.latestRoundData()).toEqual({ roundId: 1n, answer: 200_000_000_000n, updatedAt: T0 });
    await feed.refresh();
    expect(feed.latestRoundData()).toEqual({ roundId: 2n, answer: 210_000_000_000n, updatedAt: T0 + 30 });
    expect(fetchImpl).toHaveBeenCalledWith(FEED_URL);
  });

  it("retries transient failures", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockRejectedValueOnce(new Error("socket hang up"))
      .mockResolvedValueOnce(response({ price: "1", updatedAt: T0 }));
    const feed = new HttpPriceFeed({ url: FEED_URL, decimals: 8, fetchImpl });

    await expect(feed.refresh()).resolves.toEqual({ roundId: 1n, answer: 1n, updatedAt: T0 });
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("gives up after the configured attempts", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(response({}, 503));
    const feed = new HttpPriceFeed({ url: FEED_URL, decimals: 8, fetchImpl, attempts: 2 });

    await expect(feed.refresh()).rejects.toThrow("Price source responded 503");
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("rejects malformed payloads", async () => {
    const feed = new HttpPriceFeed({
      url: FEED_URL,
      decimals: 8,
      fetchImpl: vi.fn<FetchLike>().mockResolvedValue(response({ price: "12.5", updatedAt: T0 }))
    });
    await expect(feed.refresh()).rejects.toThrow("Price is not an integer: 12.5");

    const missing = new HttpPriceFeed({
      url: FEED_URL,
      decimals: 8,
      fetchImpl: vi.fn<FetchLike>().mockResolvedValue(response({ price: "1" }))
    });
    await expect(missing.refresh()).rejects.toThrow("Price payload missing price or updatedAt");
  });
});

describe("InMemoryDelegationRegistry", () => {
  it("keys delegations by holder and space", () => {
    const registry = new InMemoryDelegationRegistry();
    const holder = "0x00000000000000000000000000000000000000aa";
    const delegate = "0x00000000000000000000000000000000000000bb";

    registry.setDelegate(holder, "0xABCD", delegate);
    expect(registry.delegation(holder, "0xabcd")).toBe(getAddress(delegate));
    expect(registry.delegation(holder, "0x01")).toBeNull();
  });
});
