import Fastify from "fastify";
import cors from "@fastify/cors";
import { ZodError } from "zod";
import type { Address } from "viem";
import {
  FeedOracleAdapter,
  HttpPriceFeed,
  InMemoryDelegationRegistry,
  ManualPriceFeed,
  type PriceFeed
} from "@strikehouse/connectors";
import {
  FeeHandler,
  InMemoryTokenLedger,
  Ratio,
  Router,
  isEscrowError,
  systemClock,
  type Clock
} from "@strikehouse/matching";
import {
  addressParamsSchema,
  auditLogQuerySchema,
  bidRequestSchema,
  createAuctionRequestSchema,
  exerciseRequestSchema,
  faucetRequestSchema,
  getEscrowsQuerySchema,
  holderParamsSchema,
  mintOptionRequestSchema,
  optionTransferRequestSchema,
  oracleAnswerRequestSchema,
  pauseQuotesRequestSchema,
  positionRequestSchema,
  previewBidRequestSchema,
  previewQuoteRequestSchema,
  redeemRequestSchema,
  takeQuoteRequestSchema,
  transferOwnershipRequestSchema,
  votingRequestSchema,
  withdrawRequestSchema,
  type BalanceDto,
  type ErrorReply,
  type FeesDto
} from "@strikehouse/shared";
import { audit, readAuditEntries } from "./auditLog";
import { loadMarketConfig, type FeedConfig, type MarketConfig } from "./configLoader";
import { setupMonitoring } from "./monitoring";
import {
  auditEventName,
  serializeBidPreview,
  serializeBidQuote,
  serializeEscrow,
  serializeTakeQuoteMatch,
  serializeTakeQuotePreview,
  toAuctionTerms,
  toOptionTerms,
  toRfq,
  toSchedule,
  toWireRecord
} from "./serializers";

export const PORT = Number(process.env.PORT || "8000");
export const HOST = process.env.HOST || "0.0.0.0";
const MARKET_CONFIG_PATH = process.env.MARKET_CONFIG_PATH || "../configs/market.json";
const AUDIT_LOG_PATH = process.env.AUDIT_LOG_PATH || "./logs/audit.log";

type ServerOverrides = {
  config?: MarketConfig;
  clock?: Clock;
  auditLogPath?: string;
};

function buildFeeHandler(settings: NonNullable<MarketConfig["feeHandler"]>): FeeHandler {
  const handler = new FeeHandler({
    address: settings.address,
    owner: settings.owner,
    matchFee: Ratio.fromDecimal(settings.matchFee),
    exerciseFee: Ratio.fromDecimal(settings.exerciseFee),
    mintFee: Ratio.fromDecimal(settings.mintFee)
  });
  if (settings.distPartnerShares.length > 0) {
    handler.setDistPartnerFeeShares(
      settings.owner,
      settings.distPartnerShares.map((entry) => entry.partner),
      settings.distPartnerShares.map((entry) => Ratio.fromDecimal(entry.share))
    );
  }
  return handler;
}

async function buildFeed(feedConfig: FeedConfig, clock: Clock): Promise<PriceFeed> {
  if (feedConfig.source === "manual") {
    return new ManualPriceFeed(feedConfig.decimals, feedConfig.answer, clock.now());
  }
  const feed = new HttpPriceFeed({ url: feedConfig.url, decimals: feedConfig.decimals });
  try {
    await feed.refresh();
  } catch (error) {
    console.warn(`⚠ Initial price fetch failed for ${feedConfig.token}:`, error);
  }
  return feed;
}

export async function createServer(overrides: ServerOverrides = {}) {
  const auditPath = overrides.auditLogPath || AUDIT_LOG_PATH;
  const clock = overrides.clock ?? systemClock;

  const config = overrides.config ?? (await loadMarketConfig(new URL(MARKET_CONFIG_PATH, import.meta.url)));
  console.log(`✓ Market config loaded (chain ${config.chainId})`);

  const ledger = new InMemoryTokenLedger();
  for (const token of config.tokens) {
    ledger.registerToken(token);
  }

  const router = new Router({
    address: config.router.address,
    owner: config.router.owner,
    chainId: config.chainId,
    ledger,
    clock,
    feeHandler: config.feeHandler ? buildFeeHandler(config.feeHandler) : null
  });
  console.log(`✓ Router initialized at ${router.address}`);

  const feeds = new Map<Address, PriceFeed>();
  for (const feedConfig of config.feeds) {
    feeds.set(feedConfig.token, await buildFeed(feedConfig, clock));
  }

  for (const oracle of config.oracles) {
    router.registerOracle(
      oracle.address,
      new FeedOracleAdapter({
        feeds: [...feeds].map(([token, feed]) => ({ token, feed })),
        maxStalenessSeconds: oracle.maxStalenessSeconds,
        clock,
        decimalsOf: (token) => ledger.decimals(token)
      })
    );
  }
  console.log(`✓ ${config.oracles.length} oracle(s) over ${feeds.size} feed(s)`);

  for (const registry of config.delegationRegistries) {
    router.registerDelegationRegistry(registry, new InMemoryDelegationRegistry());
  }

  let auditedEvents = 0;
  const flushRouterEvents = async () => {
    const pending = router.events.slice(auditedEvents);
    auditedEvents += pending.length;
    for (const event of pending) {
      const { type, ...payload } = event;
      await audit(auditPath, auditEventName(type), toWireRecord(payload));
    }
  };

  const app = Fastify({ logger: true });
  await app.register(cors, { origin: true });
  setupMonitoring(app, {
    getEscrowCount: () => router.numEscrows(),
    getEscrowStates: () => {
      const states: Record<string, number> = { Unmatched: 0, Matched: 0, Closed: 0 };
      const total = router.numEscrows();
      if (total === 0) {
        return states;
      }
      for (const address of router.getEscrows(0, total)) {
        const state = router.getEscrow(address).state;
        states[state] = (states[state] ?? 0) + 1;
      }
      return states;
    },
    getEventCounts: () => {
      const counts: Record<string, number> = {};
      for (const event of router.events) {
        counts[event.type] = (counts[event.type] ?? 0) + 1;
      }
      return counts;
    },
    getFeedCount: () => feeds.size
  });

  app.addHook("onSend", async (_request, _reply, payload) => {
    await flushRouterEvents();
    return payload;
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof ZodError) {
      const body: ErrorReply = {
        status: "error",
        reason: "invalid_request",
        issues: error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      };
      return reply.status(400).send(body);
    }
    if (isEscrowError(error)) {
      request.log.warn({ code: error.code, details: error.details }, error.message);
      const body: ErrorReply = {
        status: "error",
        reason: error.message,
        code: error.code,
        category: error.category
      };
      return reply.status(error.code === "NotAnEscrow" ? 404 : 400).send(body);
    }
    if (error.statusCode && error.statusCode < 500) {
      const body: ErrorReply = { status: "error", reason: error.message };
      return reply.status(error.statusCode).send(body);
    }
    request.log.error(error);
    const body: ErrorReply = { status: "error", reason: "internal_error" };
    return reply.status(500).send(body);
  });

  app.get("/health", async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      chainId: config.chainId,
      router: router.address,
      escrows: router.numEscrows()
    };
  });

  app.get("/escrows", async (request) => {
    const query = getEscrowsQuerySchema.parse(request.query);
    const total = router.numEscrows();
    if (query.num === undefined && query.from === total) {
      return { status: "ok", total, escrows: [] };
    }
    const addresses = router.getEscrows(query.from, query.num ?? total - query.from);
    return {
      status: "ok",
      total,
      escrows: addresses.map((address) => serializeEscrow(router.getEscrow(address)))
    };
  });

  app.get("/escrows/:address", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    return { status: "ok", escrow: serializeEscrow(router.getEscrow(address)) };
  });

  app.post("/auctions", async (request) => {
    const body = createAuctionRequestSchema.parse(request.body);
    const escrow = router.createAuction(body.sender, {
      escrowOwner: body.escrowOwner,
      terms: toAuctionTerms(body.terms),
      schedule: toSchedule(body.schedule),
      distPartner: body.distPartner
    });
    return { status: "ok", escrow: serializeEscrow(escrow) };
  });

  app.post("/escrows/:address/preview-bid", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = previewBidRequestSchema.parse(request.body);
    const preview = router.previewBid(address, Ratio.fromDecimal(body.relBid), body.refSpot, body.oracleData);
    return { status: "ok", preview: serializeBidPreview(preview) };
  });

  app.post("/escrows/:address/bids", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = bidRequestSchema.parse(request.body);
    const quote = router.bidOnAuction(body.sender, address, {
      optionReceiver: body.optionReceiver,
      relBid: Ratio.fromDecimal(body.relBid),
      refSpot: body.refSpot,
      oracleData: body.oracleData
    });
    return {
      status: "ok",
      quote: serializeBidQuote(quote),
      escrow: serializeEscrow(router.getEscrow(address))
    };
  });

  app.post("/quotes/preview", async (request) => {
    const body = previewQuoteRequestSchema.parse(request.body);
    const preview = await router.previewTakeQuote(toRfq(body.rfq), body.distPartner);
    return { status: "ok", preview: serializeTakeQuotePreview(preview) };
  });

  app.post("/quotes/take", async (request) => {
    const body = takeQuoteRequestSchema.parse(request.body);
    const { escrow, match } = await router.takeQuote(body.sender, {
      escrowOwner: body.escrowOwner,
      rfq: toRfq(body.rfq),
      distPartner: body.distPartner
    });
    return { status: "ok", match: serializeTakeQuoteMatch(match), escrow: serializeEscrow(escrow) };
  });

  app.post("/quotes/pause", async (request) => {
    const body = pauseQuotesRequestSchema.parse(request.body);
    const paused = router.togglePauseQuotes(body.sender);
    return { status: "ok", quoter: body.sender, paused };
  });

  app.post("/options/mint", async (request) => {
    const body = mintOptionRequestSchema.parse(request.body);
    const escrow = router.mintOption(body.sender, {
      optionReceiver: body.optionReceiver,
      escrowOwner: body.escrowOwner,
      optionInfo: toOptionTerms(body.optionInfo),
      naming: body.naming,
      distPartner: body.distPartner
    });
    return { status: "ok", escrow: serializeEscrow(escrow) };
  });

  app.post("/escrows/:address/exercise", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = exerciseRequestSchema.parse(request.body);
    const result = router.exercise(body.sender, address, {
      receiver: body.receiver,
      amount: body.amount,
      payInSettlementToken: body.payInSettlementToken,
      oracleData: body.oracleData
    });
    return { status: "ok", result: toWireRecord(result) };
  });

  app.post("/escrows/:address/borrow", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = positionRequestSchema.parse(request.body);
    const result = router.borrow(body.sender, address, { receiver: body.receiver, amount: body.amount });
    return { status: "ok", result: toWireRecord(result) };
  });

  app.post("/escrows/:address/repay", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = positionRequestSchema.parse(request.body);
    const result = router.repay(body.sender, address, { receiver: body.receiver, amount: body.amount });
    return { status: "ok", result: toWireRecord(result) };
  });

  app.post("/escrows/:address/withdraw", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = withdrawRequestSchema.parse(request.body);
    router.withdraw(body.sender, address, { to: body.to, token: body.token, amount: body.amount });
    return { status: "ok", escrow: serializeEscrow(router.getEscrow(address)) };
  });

  app.post("/escrows/:address/redeem", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = redeemRequestSchema.parse(request.body);
    const amount = router.redeem(body.sender, address, body.to);
    return { status: "ok", amount: amount.toString() };
  });

  app.post("/escrows/:address/owner", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = transferOwnershipRequestSchema.parse(request.body);
    router.transferOwnership(body.sender, address, body.newOwner);
    return { status: "ok", escrow: serializeEscrow(router.getEscrow(address)) };
  });

  app.post("/escrows/:address/option-transfer", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = optionTransferRequestSchema.parse(request.body);
    router.transferOptionToken(body.sender, address, body.to, body.amount);
    return { status: "ok", escrow: serializeEscrow(router.getEscrow(address)) };
  });

  app.post("/escrows/:address/voting", async (request) => {
    const { address } = addressParamsSchema.parse(request.params);
    const body = votingRequestSchema.parse(request.body);
    if (body.kind === "onChain") {
      router.delegateOnChainVoting(body.sender, address, body.delegatee);
    } else {
      router.delegateOffChainVoting(body.sender, address, body.spaceId, body.delegate);
    }
    return { status: "ok", kind: body.kind };
  });

  app.get("/fees", async () => {
    const fees: FeesDto = {
      feeHandler: router.feeRecipient(),
      matchFee: router.getMatchFeeInfo(null).matchFee.toString(),
      exerciseFee: router.getExerciseFeeRate().toString(),
      mintFee: router.getMintFeeInfo(null).matchFee.toString(),
      distPartnerShares: (router.feeHandler?.distPartnerFeeSharesList() ?? []).map(([partner, share]) => ({
        partner,
        share: share.toString()
      }))
    };
    return { status: "ok", fees };
  });

  app.post("/oracles/answers", async (request, reply) => {
    const body = oracleAnswerRequestSchema.parse(request.body);
    const feed = feeds.get(body.token);
    if (!(feed instanceof ManualPriceFeed)) {
      const error: ErrorReply = { status: "error", reason: "no_manual_feed" };
      return reply.status(400).send(error);
    }
    const round = feed.setAnswer(body.answer, body.updatedAt ?? clock.now());
    await audit(auditPath, "oracle_answer_set", {
      token: body.token,
      roundId: round.roundId.toString(),
      answer: round.answer.toString(),
      updatedAt: round.updatedAt
    });
    return {
      status: "ok",
      roundId: round.roundId.toString(),
      answer: round.answer.toString(),
      updatedAt: round.updatedAt
    };
  });

  if (config.faucetEnabled) {
    app.post("/faucet", async (request) => {
      const body = faucetRequestSchema.parse(request.body);
      ledger.mint(body.token, body.to, body.amount);
      await audit(auditPath, "faucet_minted", {
        token: body.token,
        to: body.to,
        amount: body.amount.toString()
      });
      return { status: "ok", balance: ledger.balanceOf(body.token, body.to).toString() };
    });
  }

  app.get("/balances/:holder", async (request) => {
    const { holder } = holderParamsSchema.parse(request.params);
    const balances: BalanceDto[] = ledger.holdings(holder).map(({ token, balance }) => ({
      token: token.address,
      symbol: token.symbol,
      decimals: token.decimals,
      balance: balance.toString()
    }));
    return { status: "ok", holder, balances };
  });

  app.get("/audit/logs", async (request) => {
    const { limit } = auditLogQuerySchema.parse(request.query);
    const entries = await readAuditEntries(auditPath, limit);
    return { entries, count: entries.length };
  });

  return { app, config, router, ledger, feeds, auditPath };
}
