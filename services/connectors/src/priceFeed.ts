import { fail } from "@strikehouse/matching";

export interface RoundData {
  roundId: bigint;
  answer: bigint;
  updatedAt: number;
}

export interface PriceFeed {
  readonly decimals: number;
  latestRoundData(): RoundData;
}

export class ManualPriceFeed implements PriceFeed {
  private round: RoundData;

  constructor(
    readonly decimals: number,
    answer: bigint,
    updatedAt: number
  ) {
    this.round = { roundId: 1n, answer, updatedAt };
  }

  setAnswer(answer: bigint, updatedAt: number): RoundData {
    this.round = { roundId: this.round.roundId + 1n, answer, updatedAt };
    return this.round;
  }

  latestRoundData(): RoundData {
    return this.round;
  }
}

export type FetchLike = (url: string) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export interface HttpPriceFeedOptions {
  url: string;
  decimals: number;
  fetchImpl?: FetchLike;
  attempts?: number;
}

async function withRetry<T>(fn: () => Promise<T>, attempts: number): Promise<T> {
  let lastError: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
    }
  }
  throw lastError;
}

function parsePricePayload(payload: unknown): { price: string; updatedAt: number } {
  if (typeof payload !== "object" || payload === null) {
    throw new Error("Price payload is not an object");
  }
  const price = "price" in payload ? payload.price : undefined;
  const updatedAt = "updatedAt" in payload ? payload.updatedAt : undefined;
  if ((typeof price !== "string" && typeof price !== "number") || typeof updatedAt !== "number") {
    throw new Error("Price payload missing price or updatedAt");
  }
  return { price: String(price), updatedAt };
}

/**
 * Feed backed by a JSON endpoint returning `{ price, updatedAt }`, where price is an
 * integer already scaled by `decimals`. Reads serve the last refreshed round.
 */
export class HttpPriceFeed implements PriceFeed {
  readonly decimals: number;
  private round: RoundData | null = null;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HttpPriceFeedOptions) {
    this.decimals = options.decimals;
    this.fetchImpl = options.fetchImpl ?? ((url) => fetch(url));
  }

  get url(): string {
    return this.options.url;
  }

  async refresh(): Promise<RoundData> {
    const payload = await withRetry(async () => {
      const res = await this.fetchImpl(this.options.url);
      if (!res.ok) {
        throw new Error(`Price source responded ${res.status}`);
      }
      return res.json();
    }, this.options.attempts ?? 3);

    const { price, updatedAt } = parsePricePayload(payload);
    if (!/^-?\d+$/.test(price)) {
      throw new Error(`Price is not an integer: ${price}`);
    }
    this.round = {
      roundId: (this.round?.roundId ?? 0n) + 1n,
      answer: BigInt(price),
      updatedAt
    };
    return this.round;
  }

  latestRoundData(): RoundData {
    if (!this.round) {
      return fail("InvalidOracleAnswer", `No round fetched yet from ${this.options.url}`);
    }
    return this.round;
  }
}
