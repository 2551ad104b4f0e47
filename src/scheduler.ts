import type { HttpPriceFeed } from "@strikehouse/connectors";

/** Refreshes every HTTP feed each interval and logs the ones that fail. Returns a stop function. */
export function runFeedRefreshJob(intervalMs: number, feeds: readonly HttpPriceFeed[]): () => void {
  const timer = setInterval(async () => {
    const results = await Promise.allSettled(feeds.map((feed) => feed.refresh()));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        console.error(`Feed refresh job error (${feeds[i]?.url}):`, result.reason);
      }
    });
  }, intervalMs);

  return () => clearInterval(timer);
}
