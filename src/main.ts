import { HttpPriceFeed } from "@strikehouse/connectors";
import { audit } from "./auditLog";
import { runFeedRefreshJob } from "./scheduler";
import { HOST, PORT, createServer } from "./server";

const start = async () => {
  try {
    const { app, config, router, feeds, auditPath } = await createServer();
    await app.listen({ port: PORT, host: HOST });

    const httpFeeds = [...feeds.values()].filter((feed): feed is HttpPriceFeed => feed instanceof HttpPriceFeed);
    if (httpFeeds.length > 0) {
      runFeedRefreshJob(config.feedRefreshMs, httpFeeds);
      console.log(`✓ Refreshing ${httpFeeds.length} HTTP feed(s) every ${config.feedRefreshMs}ms`);
    }

    console.log(`\n🚀 Escrow matching server running on http://${HOST}:${PORT}`);
    console.log(`   Chain id: ${config.chainId}`);
    console.log(`   Router: ${router.address}`);
    console.log(`   Fee handler: ${router.feeRecipient() ?? "none"}`);
    console.log(`   Faucet: ${config.faucetEnabled ? "enabled" : "disabled"}`);
    console.log(`\n📊 Endpoints:`);
    console.log(`   GET  /health, /metrics, /fees, /audit/logs`);
    console.log(`   GET  /escrows, /escrows/:address, /balances/:holder`);
    console.log(`   POST /auctions, /escrows/:address/preview-bid, /escrows/:address/bids`);
    console.log(`   POST /quotes/preview, /quotes/take, /quotes/pause, /options/mint`);
    console.log(`   POST /escrows/:address/{exercise,borrow,repay,withdraw,redeem,owner,option-transfer,voting}`);
    console.log(`   POST /oracles/answers${config.faucetEnabled ? ", /faucet" : ""}`);
    console.log(`\n✨ Ready to serve requests\n`);

    await audit(auditPath, "server_started", {
      port: PORT,
      host: HOST,
      chainId: config.chainId,
      router: router.address
    });
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
};

void start();
