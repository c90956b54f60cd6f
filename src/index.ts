import { config } from "./env";
import { createReviewAgent } from "./integrations/agent/agent";
import { createGitHubHostingClient } from "./integrations/github/hosting";
import { hostForInstallation, registerEventHandlers } from "./integrations/github/webhooks";
import { errorMessage, logger } from "./logger";
import { PublicationLedger } from "./publishing/ledger";
import { AppState, createApp } from "./server";

const port = Number(config.PORT) || 3000;

// One ledger for the lifetime of the process, shared by webhooks and tools
const ledger = new PublicationLedger();
const agent = createReviewAgent();
const state: AppState = { isShuttingDown: false };

registerEventHandlers({ ledger, agent, hostForInstallation });

const app = createApp({ host: createGitHubHostingClient(), ledger, agent }, state);

function shutdown(signal: string): void {
  logger.info("Graceful shutdown started", { signal });
  state.isShuttingDown = true;

  server.close(() => {
    logger.info("HTTP server closed");
    process.exit(0);
  });

  // Give in-flight requests time to complete (max 10 seconds)
  setTimeout(() => {
    logger.info("Shutdown complete");
    process.exit(0);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled rejection", { error: errorMessage(reason) });
});

logger.info(`Starting on 0.0.0.0:${port}`);
const server = app.listen(port, "0.0.0.0", () => {
  logger.info(`Listening on 0.0.0.0:${port}`);
});
