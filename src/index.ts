/**
 * SPAN Panel Link - Application Entry Point
 *
 * Loads configured entries, sets up a coordinator per panel and serves:
 * - Health check
 * - Provisioning, re-auth and options flows
 * - Breaker switches of configured panels
 * - Request ID tracing and global error handling
 */
import { serve } from "@hono/node-server";
import { createApp } from "./api/app.js";
import { config, getPanelClientConfig } from "./config.js";
import { createFileEntryStore, loadEntryRepository } from "./entries/index.js";
import { createFlowManager, formatFlowManagerError } from "./flow-manager/index.js";
import { createLogger } from "./logger.js";
import { createPanelClientFactory } from "./panel/index.js";
import { createPanelRuntime, formatRuntimeError } from "./runtime/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  SPAN PANEL LINK");
console.log("========================================");
console.log("");

// Non-sensitive values only
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    dataDir: config.DATA_DIR,
    panelRequestTimeoutMs: config.PANEL_REQUEST_TIMEOUT_MS,
    pollingEnabled: config.ENABLE_COORDINATOR_POLLING,
  },
  "Configuration loaded",
);

// =============================================================================
// SERVICES
// =============================================================================

const loaded = await loadEntryRepository(createFileEntryStore(config.DATA_DIR));
if (loaded.isErr()) {
  process.exit(1);
}
const entries = loaded.value;

const createClient = createPanelClientFactory(getPanelClientConfig());

const flows = createFlowManager({
  createClient,
  entries,
  onEntryCreated: async (entryId) => {
    const result = await runtime.setupEntry(entryId);
    if (result.isErr()) {
      log.warn({ entryId, error: formatRuntimeError(result.error) }, "New entry not ready yet");
    }
  },
});

const runtime = createPanelRuntime({
  entries,
  createClient,
  pollingEnabled: config.ENABLE_COORDINATOR_POLLING,
  onAuthFailed: (entryId) => {
    flows
      .startReauthFlow(entryId)
      .then((outcome) => {
        if (outcome.isErr()) {
          log.warn({ entryId, error: formatFlowManagerError(outcome.error) }, "Re-auth flow not started");
        }
      })
      .catch((error: unknown) => {
        log.error(
          { entryId, error: error instanceof Error ? error.message : String(error) },
          "Re-auth flow failed to start",
        );
      });
  },
});

await runtime.setupAll();

// =============================================================================
// START SERVER
// =============================================================================

const app = createApp({ entries, flows, runtime });

const server = serve(
  {
    fetch: app.fetch,
    port: config.PORT,
    hostname: "0.0.0.0",
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = (signal: string) => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  runtime.shutdown();

  server.close(() => {
    log.info("Shutdown complete");
    process.exit(0);
  });
};

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
