import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { EndpointResolver } from "./lib/endpoint-resolver.js";
import { HelmDriver } from "./lib/helm-driver.js";
import { createLogger } from "./lib/logger.js";
import { SessionReconciler } from "./lib/session-reconciler.js";
import { SessionsStore } from "./lib/sessions-store.js";

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

for (const issue of config.issues) {
  logger.warn({ issue }, "Configuration issue");
}

const sessionsStore = new SessionsStore(config.sessionsDbPath);

const driver = new HelmDriver({
  chartPath: config.helmChartPath,
  helmBin: config.helmBin,
  timeoutMs: config.deployTimeoutMs,
  kubeContext: config.kubeContext,
  logger,
});

const resolver = new EndpointResolver({
  kubectlBin: config.kubectlBin,
  kubeContext: config.kubeContext,
  frontDoorSuffix: config.frontDoorSuffix,
  logger,
});

const reconciler = new SessionReconciler({
  store: sessionsStore,
  driver,
  resolver,
  logger,
  sessionTtlMs: config.sessionTtlDays * 24 * 60 * 60 * 1_000,
});

const app = createApp({
  reconciler,
  logger,
  webOrigin: config.webOrigin,
  issues: config.issues,
});

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port, chart: config.helmChartPath }, "Dev session API listening");
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, "Shutting down");
  server.close(() => {
    sessionsStore.close();
    process.exit(0);
  });
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
