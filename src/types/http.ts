// ── Wire types for /v1/completions ──────────────────────────────────────────

import type { FinishReason } from "./completion.js";
import type { ErrorResponse } from "./common.js";

export interface CompletionUsageBody {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface CompletionResponseBody {
  id: string;
  object: "completion";
  created: number;
  model: string;
  text: string;
  finish_reason: FinishReason;
  usage: CompletionUsageBody;
}

export interface AcceptedResponseBody {
  status: "accepted";
  request_id: string;
}

export interface WebhookPayload {
  request_id: string;
  status_code: number;
  data: CompletionResponseBody | ErrorResponse;
}
