import { logger } from "../config/logger.js";
import {
  AppError,
  InvalidRequestError,
  RequestCancelledError,
  UpstreamRejectedError,
  UpstreamTimeoutError,
} from "../middleware/error-handler.js";
import type {
  CompletionProvider,
  CompletionRequest,
  CompletionResponse,
  FinishReason,
  ProviderCompletionParams,
  UpstreamCompletion,
} from "../types/completion.js";

export interface BridgeSettings {
  defaultModel: string;
  timeoutMs: number;
}

export interface HandleOptions {
  requestId?: string;
  /** Caller-side cancellation, e.g. the client dropping the connection. */
  signal?: AbortSignal;
}

export function mapFinishReason(reason: string | null): FinishReason {
  switch (reason) {
    case "stop":
    case "tool_calls":
    case "function_call":
      return "stop";
    case "length":
      return "length";
    default:
      return "error";
  }
}

export function normalizeCompletion(
  upstream: UpstreamCompletion,
  requestedModel: string,
): CompletionResponse {
  const promptTokens = upstream.usage?.promptTokens ?? 0;
  const completionTokens = upstream.usage?.completionTokens ?? 0;

  return Object.freeze({
    id: upstream.id,
    model: upstream.model || requestedModel,
    text: upstream.text ?? "",
    finishReason: mapFinishReason(upstream.finishReason),
    usage: Object.freeze({
      promptTokens,
      completionTokens,
      totalTokens: upstream.usage?.totalTokens ?? promptTokens + completionTokens,
    }),
    created: upstream.created ?? Math.floor(Date.now() / 1000),
  });
}

/** Throws InvalidRequest when the request cannot be sent upstream. */
export function assertDispatchable(request: CompletionRequest): void {
  if (request.messages.length === 0) {
    throw new InvalidRequestError("messages must contain at least one message");
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Translates one completion request into one upstream call.
 *
 * The upstream call runs under its own AbortController, which fires on the
 * configured timeout or when the caller's signal aborts. The wait is raced
 * against that controller, so a provider that ignores the signal still
 * cannot hold the caller past the bound.
 */
export class AsyncCompletionBridge {
  constructor(
    private readonly provider: CompletionProvider,
    private readonly settings: BridgeSettings,
  ) {}

  async handle(
    request: CompletionRequest,
    options: HandleOptions = {},
  ): Promise<CompletionResponse> {
    const requestId = options.requestId ?? "internal";

    assertDispatchable(request);
    if (options.signal?.aborted) {
      throw new RequestCancelledError();
    }

    const model = request.model ?? this.settings.defaultModel;
    const params: ProviderCompletionParams = {
      model,
      messages: request.messages,
      temperature: request.temperature,
      maxTokens: request.maxTokens,
      topP: request.topP,
      stop: request.stop,
    };

    logger.info({
      action: "completion_dispatched",
      requestId,
      provider: this.provider.name,
      model,
      messageCount: request.messages.length,
    });

    const started = Date.now();
    try {
      const upstream = await this.dispatch(params, options.signal);
      const response = normalizeCompletion(upstream, model);

      logger.info({
        action: "completion_done",
        requestId,
        model: response.model,
        finishReason: response.finishReason,
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
        duration: Date.now() - started,
      });
      return response;
    } catch (err) {
      const failure = err instanceof AppError
        ? err
        : new UpstreamRejectedError(`Upstream call failed: ${errorMessage(err)}`);

      logger.warn({
        action: "completion_failed",
        requestId,
        model,
        code: failure.code,
        error: failure.message,
        upstreamStatus: failure instanceof UpstreamRejectedError ? failure.upstreamStatus : undefined,
        duration: Date.now() - started,
      });
      throw failure;
    }
  }

  private async dispatch(
    params: ProviderCompletionParams,
    callerSignal: AbortSignal | undefined,
  ): Promise<UpstreamCompletion> {
    const controller = new AbortController();
    const { timeoutMs } = this.settings;
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = () => controller.abort();
    callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(timedOut ? new UpstreamTimeoutError(timeoutMs) : new RequestCancelledError()),
        { once: true },
      );
    });

    try {
      return await Promise.race([
        this.provider.complete(params, controller.signal),
        aborted,
      ]);
    } catch (err) {
      // The provider may surface our own abort before the race sees it.
      if (controller.signal.aborted) {
        throw timedOut ? new UpstreamTimeoutError(timeoutMs) : new RequestCancelledError();
      }
      throw err;
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener("abort", onCallerAbort);
    }
  }
}
