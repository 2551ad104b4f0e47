import type { FastifyInstance } from "fastify";

export type MonitoringDeps = {
  getEscrowCount: () => number;
  getEscrowStates: () => Record<string, number>;
  getEventCounts: () => Record<string, number>;
  getFeedCount: () => number;
};

export function setupMonitoring(app: FastifyInstance, deps: MonitoringDeps): void {
  app.get("/metrics", async () => {
    return {
      uptime: process.uptime(),
      memoryUsage: process.memoryUsage(),
      cpuUsage: process.cpuUsage(),
      escrowCount: deps.getEscrowCount(),
      escrowStates: deps.getEscrowStates(),
      eventCounts: deps.getEventCounts(),
      priceFeeds: deps.getFeedCount()
    };
  });

  app.addHook("onRequest", async (request, _reply) => {
    request.log.info({
      method: request.method,
      url: request.url,
      ip: request.ip,
      userAgent: request.headers["user-agent"],
      requestId: request.id
    });
  });

  app.addHook("onResponse", async (request, reply) => {
    request.log.info({
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode,
      responseTime: reply.elapsedTime,
      requestId: request.id
    });
  });
}
