import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import { describeError } from "../middleware/error-handler.js";
import {
  assertDispatchable,
  type AsyncCompletionBridge,
} from "../services/completionBridge.js";
import type { BackgroundTasks } from "../services/backgroundTasks.js";
import type { WebhookDispatcher } from "../services/webhookDispatcher.js";
import {
  parseAsyncCompletionBody,
  parseCompletionBody,
} from "../services/requestParser.js";
import type { CompletionRequest, CompletionResponse } from "../types/completion.js";
import type {
  AcceptedResponseBody,
  CompletionResponseBody,
  WebhookPayload,
} from "../types/http.js";

export interface CompletionsRouterDeps {
  bridge: AsyncCompletionBridge;
  webhooks: WebhookDispatcher;
  tasks: BackgroundTasks;
}

export function toResponseBody(result: CompletionResponse): CompletionResponseBody {
  return {
    id: result.id,
    object: "completion",
    created: result.created,
    model: result.model,
    text: result.text,
    finish_reason: result.finishReason,
    usage: {
      prompt_tokens: result.usage.promptTokens,
      completion_tokens: result.usage.completionTokens,
      total_tokens: result.usage.totalTokens,
    },
  };
}

async function settle(
  bridge: AsyncCompletionBridge,
  request: CompletionRequest,
  requestId: string,
): Promise<WebhookPayload> {
  try {
    const result = await bridge.handle(request, { requestId });
    return { request_id: requestId, status_code: 200, data: toResponseBody(result) };
  } catch (err) {
    const { status, body } = describeError(err, requestId);
    return { request_id: requestId, status_code: status, data: body };
  }
}

export function completionsRouter({ bridge, webhooks, tasks }: CompletionsRouterDeps): Router {
  const router = Router();

  // ── POST /v1/completions ──────────────────────────────────────────────────
  router.post("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseCompletionBody(req.body);
      const result = await bridge.handle(request, {
        requestId: req.context.requestId,
        signal: req.context.signal,
      });
      res.json(toResponseBody(result));
    } catch (err) {
      next(err);
    }
  });

  // ── POST /v1/completions/async ────────────────────────────────────────────
  // Answers 202 at once; the outcome goes to every webhook. The background
  // call is not tied to this connection.
  router.post("/async", (req: Request, res: Response, next: NextFunction) => {
    try {
      const { request, webhooks: urls } = parseAsyncCompletionBody(req.body);
      assertDispatchable(request);
      const { requestId } = req.context;

      tasks.run(`completion:${requestId}`, async () => {
        const payload = await settle(bridge, request, requestId);
        await webhooks.broadcast(urls, payload);
      });

      const body: AcceptedResponseBody = { status: "accepted", request_id: requestId };
      res.status(202).json(body);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
