import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import type { ProviderCredentials } from "../config/index.js";
import {
  UpstreamRejectedError,
  UpstreamTimeoutError,
} from "../middleware/error-handler.js";
import type {
  ChatMessage,
  CompletionProvider,
  ProviderCompletionParams,
  UpstreamCompletion,
} from "../types/completion.js";

export interface OpenAIClientOptions {
  /** Replaces the global fetch; tests drive the client through this. */
  fetch?: typeof fetch;
  /** Total bound per upstream call; kept equal to the bridge's. */
  timeoutMs?: number;
}

export function createOpenAIClient(
  credentials: ProviderCredentials,
  options: OpenAIClientOptions = {},
): OpenAI {
  return new OpenAI({
    apiKey: credentials.apiKey,
    baseURL: credentials.baseUrl,
    // Retries are the caller's decision.
    maxRetries: 0,
    ...(options.timeoutMs !== undefined && { timeout: options.timeoutMs }),
    ...(options.fetch && { fetch: options.fetch }),
  });
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

function toUpstreamCompletion(completion: ChatCompletion): UpstreamCompletion {
  const choice = completion.choices[0];
  if (!choice) {
    throw new UpstreamRejectedError("Upstream provider returned no choices");
  }

  return {
    id: completion.id,
    model: completion.model,
    text: choice.message.content,
    finishReason: choice.finish_reason,
    created: completion.created,
    ...(completion.usage && {
      usage: {
        promptTokens: completion.usage.prompt_tokens,
        completionTokens: completion.usage.completion_tokens,
        totalTokens: completion.usage.total_tokens,
      },
    }),
  };
}

function upstreamMessage(err: APIError): string {
  const detail = err.error;
  if (
    typeof detail === "object" &&
    detail !== null &&
    "message" in detail &&
    typeof detail.message === "string"
  ) {
    return detail.message;
  }
  return err.message;
}

/**
 * Converts SDK failures into the bridge's error taxonomy. Aborts are passed
 * through untouched: only the bridge knows whether it fired the abort for a
 * timeout or for a client disconnect.
 */
export function translateOpenAIError(err: unknown, timeoutMs: number): unknown {
  if (err instanceof APIUserAbortError) return err;
  if (err instanceof APIConnectionTimeoutError) {
    return new UpstreamTimeoutError(timeoutMs);
  }
  if (err instanceof APIConnectionError) {
    return new UpstreamRejectedError(
      `Upstream provider unreachable: ${err.message}`,
      "upstream_unreachable",
    );
  }
  if (err instanceof APIError) {
    return new UpstreamRejectedError(upstreamMessage(err), "upstream_rejected", err.status);
  }
  return err;
}

export class OpenAIProvider implements CompletionProvider {
  readonly name = "openai";

  constructor(private readonly client: OpenAI) {}

  async complete(
    params: ProviderCompletionParams,
    signal: AbortSignal,
  ): Promise<UpstreamCompletion> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: params.model,
      messages: params.messages.map(toMessageParam),
      stream: false,
      ...(params.temperature != null && { temperature: params.temperature }),
      ...(params.maxTokens != null && { max_tokens: params.maxTokens }),
      ...(params.topP != null && { top_p: params.topP }),
      ...(params.stop && params.stop.length > 0 && { stop: params.stop }),
    };

    try {
      const completion = await this.client.chat.completions.create(body, { signal });
      return toUpstreamCompletion(completion);
    } catch (err) {
      throw translateOpenAIError(err, this.client.timeout);
    }
  }
}
