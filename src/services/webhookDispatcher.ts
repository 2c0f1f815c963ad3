import { logger } from "../config/logger.js";
import type { WebhookPayload } from "../types/http.js";

export interface WebhookDispatcherOptions {
  timeoutMs: number;
  fetch?: typeof fetch;
}

export interface WebhookDelivery {
  url: string;
  delivered: boolean;
  status?: number;
  error?: string;
}

/**
 * Posts the outcome of a background completion to caller-supplied URLs.
 * Deliveries are attempted once; failures are logged and reported, never thrown.
 */
export class WebhookDispatcher {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: WebhookDispatcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async deliver(url: string, payload: WebhookPayload): Promise<WebhookDelivery> {
    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Request-Id": payload.request_id,
        },
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        logger.warn({
          action: "webhook_failed",
          requestId: payload.request_id,
          url,
          status: res.status,
        });
        return { url, delivered: false, status: res.status };
      }

      logger.info({
        action: "webhook_delivered",
        requestId: payload.request_id,
        url,
        status: res.status,
      });
      return { url, delivered: true, status: res.status };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.warn({
        action: "webhook_failed",
        requestId: payload.request_id,
        url,
        error,
      });
      return { url, delivered: false, error };
    }
  }

  async broadcast(urls: readonly string[], payload: WebhookPayload): Promise<WebhookDelivery[]> {
    return Promise.all(urls.map((url) => this.deliver(url, payload)));
  }
}
