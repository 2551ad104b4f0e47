import { readFile, stat } from "node:fs/promises";
import { z } from "zod";
import { addressSchema, ratioSchema, signedIntegerSchema } from "@strikehouse/shared";

const tokenConfigSchema = z.object({
  address: addressSchema,
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(36)
});

const feedConfigSchema = z.discriminatedUnion("source", [
  z.object({
    source: z.literal("manual"),
    token: addressSchema,
    decimals: z.number().int().min(0).max(36),
    answer: signedIntegerSchema
  }),
  z.object({
    source: z.literal("http"),
    token: addressSchema,
    decimals: z.number().int().min(0).max(36),
    url: z.string().url()
  })
]);

export type FeedConfig = z.infer<typeof feedConfigSchema>;

const feeHandlerConfigSchema = z.object({
  address: addressSchema,
  owner: addressSchema,
  matchFee: ratioSchema.default("0"),
  exerciseFee: ratioSchema.default("0"),
  mintFee: ratioSchema.default("0"),
  distPartnerShares: z.array(z.object({ partner: addressSchema, share: ratioSchema })).default([])
});

const marketConfigSchema = z.object({
  chainId: z.number().int().positive(),
  router: z.object({
    address: addressSchema,
    owner: addressSchema
  }),
  tokens: z.array(tokenConfigSchema).min(1),
  feeds: z.array(feedConfigSchema).default([]),
  oracles: z
    .array(
      z.object({
        address: addressSchema,
        maxStalenessSeconds: z.number().int().positive()
      })
    )
    .default([]),
  feeHandler: feeHandlerConfigSchema.nullable().default(null),
  delegationRegistries: z.array(addressSchema).default([]),
  faucetEnabled: z.boolean().default(false),
  feedRefreshMs: z.number().int().positive().default(30000)
});

export type MarketConfig = z.infer<typeof marketConfigSchema>;

let cachedConfig: MarketConfig | null = null;
let cachedMtime = 0;

export function parseMarketConfig(raw: unknown): MarketConfig {
  const result = marketConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid market config: ${result.error.message}`);
  }
  return result.data;
}

export async function loadMarketConfig(configPath: string | URL): Promise<MarketConfig> {
  const pathStr = configPath instanceof URL ? configPath.pathname : configPath;

  try {
    const stats = await stat(pathStr);
    const mtime = stats.mtimeMs;

    if (cachedConfig && mtime === cachedMtime) {
      return cachedConfig;
    }

    const raw = await readFile(pathStr, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    const result = marketConfigSchema.safeParse(parsed);

    if (!result.success) {
      console.error("Market config validation failed:", result.error);
      if (cachedConfig) {
        console.warn("Using cached market config due to validation error");
        return cachedConfig;
      }
      throw new Error(`Invalid market config: ${result.error.message}`);
    }

    cachedConfig = result.data;
    cachedMtime = mtime;
    return result.data;
  } catch (error) {
    if (cachedConfig) {
      console.warn("Using cached market config due to file read error:", error);
      return cachedConfig;
    }
    throw error;
  }
}

export function resetMarketConfigCache(): void {
  cachedConfig = null;
  cachedMtime = 0;
}
