// ── Bridge domain types ─────────────────────────────────────────────────────
// Independent of both the HTTP wire format and the upstream SDK.

export type MessageRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface GenerationParams {
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  stop?: string[];
}

export interface CompletionRequest extends GenerationParams {
  /** Falls back to the configured default model when absent. */
  model?: string;
  messages: ChatMessage[];
}

export type FinishReason = "stop" | "length" | "error";

export interface TokenUsage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export interface CompletionResponse {
  readonly id: string;
  readonly model: string;
  readonly text: string;
  readonly finishReason: FinishReason;
  readonly usage: TokenUsage;
  readonly created: number;
}

// ── Provider seam ───────────────────────────────────────────────────────────

export interface ProviderCompletionParams extends GenerationParams {
  model: string;
  messages: ChatMessage[];
}

/** What a provider hands back before the bridge normalizes it. */
export interface UpstreamCompletion {
  id: string;
  model: string;
  text: string | null;
  finishReason: string | null;
  usage?: TokenUsage;
  created?: number;
}

export interface CompletionProvider {
  readonly name: string;
  complete(
    params: ProviderCompletionParams,
    signal: AbortSignal,
  ): Promise<UpstreamCompletion>;
}
