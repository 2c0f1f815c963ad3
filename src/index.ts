import { config } from "./config/index.js";
import { logger } from "./config/logger.js";
import { createApp } from "./app.js";
import { AsyncCompletionBridge } from "./services/completionBridge.js";
import { BackgroundTasks } from "./services/backgroundTasks.js";
import { createOpenAIClient, OpenAIProvider } from "./services/openai.js";
import { WebhookDispatcher } from "./services/webhookDispatcher.js";

const provider = new OpenAIProvider(createOpenAIClient(config.provider, {
  timeoutMs: config.upstreamTimeoutMs,
}));
const bridge = new AsyncCompletionBridge(provider, {
  defaultModel: config.provider.defaultModel,
  timeoutMs: config.upstreamTimeoutMs,
});
const webhooks = new WebhookDispatcher({ timeoutMs: config.webhookTimeoutMs });
const tasks = new BackgroundTasks();

const app = createApp({ config, bridge, webhooks, tasks });

// ── Start server ────────────────────────────────────────────────────────────
const server = app.listen(config.port, () => {
  logger.info({
    action: "server_start",
    port: config.port,
    env: config.env,
    baseUrl: config.provider.baseUrl,
    defaultModel: config.provider.defaultModel,
    upstreamTimeoutMs: config.upstreamTimeoutMs,
    message: `Completion bridge listening on port ${config.port}`,
  });
});

// ── Graceful shutdown ───────────────────────────────────────────────────────
function shutdown(signal: string): void {
  logger.info({ action: "shutdown_start", signal, pendingTasks: tasks.size });

  server.close(() => {
    tasks
      .drain()
      .then(() => {
        logger.info({ action: "shutdown_complete", signal });
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error({
          action: "shutdown_failed",
          signal,
          error: err instanceof Error ? err.message : String(err),
        });
        process.exit(1);
      });
  });

  // Force exit after 10s if connections or background tasks won't drain
  setTimeout(() => {
    logger.error({ action: "shutdown_forced", signal, pendingTasks: tasks.size });
    process.exit(1);
  }, 10_000).unref();
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
