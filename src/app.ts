import express from "express";
import cors from "cors";
import helmet from "helmet";
import type { AppConfig } from "./config/index.js";
import { requestContext } from "./middleware/request-context.js";
import { requestLogger } from "./middleware/request-logger.js";
import { clientDisconnect } from "./middleware/client-disconnect.js";
import { errorHandler } from "./middleware/error-handler.js";
import { healthRouter } from "./routes/health.js";
import { docsRouter } from "./routes/docs.js";
import { completionsRouter } from "./routes/completions.js";
import type { AsyncCompletionBridge } from "./services/completionBridge.js";
import type { WebhookDispatcher } from "./services/webhookDispatcher.js";
import type { BackgroundTasks } from "./services/backgroundTasks.js";

export interface AppDependencies {
  config: AppConfig;
  bridge: AsyncCompletionBridge;
  webhooks: WebhookDispatcher;
  tasks: BackgroundTasks;
}

export function createApp({ config, bridge, webhooks, tasks }: AppDependencies): express.Express {
  const app = express();

  // ── Global middleware ─────────────────────────────────────────────────────
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigin,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-Id"],
      exposedHeaders: ["X-Request-Id"],
    }),
  );
  app.use(requestContext);
  app.use(requestLogger);
  app.use(express.json({ limit: config.jsonBodyLimit }));

  // ── Routes ────────────────────────────────────────────────────────────────
  app.use("/health", healthRouter(tasks));
  app.use("/", docsRouter(process.env.npm_package_version ?? "0.1.0"));
  app.use("/v1/completions", clientDisconnect, completionsRouter({ bridge, webhooks, tasks }));

  // ── Error handler (must be last) ──────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
