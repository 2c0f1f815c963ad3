import { z } from "zod";
import { InvalidRequestError } from "../middleware/error-handler.js";
import type { ChatMessage, CompletionRequest } from "../types/completion.js";

const messageSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export const completionBodySchema = z.object({
  model: z.string().min(1).optional(),
  messages: z.array(messageSchema).optional(),
  prompt: z.string().min(1).optional(),
  system: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  top_p: z.number().min(0).max(1).optional(),
  stop: z.union([z.string(), z.array(z.string()).max(4)]).optional(),
});

const webhookUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "webhook must be an http(s) URL");

export const asyncCompletionBodySchema = completionBodySchema.extend({
  webhooks: z.array(webhookUrlSchema).min(1).max(10),
});

export type CompletionBody = z.infer<typeof completionBodySchema>;
export type AsyncCompletionBody = z.infer<typeof asyncCompletionBodySchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "body"}: ${issue.message}`)
    .join("; ");
}

/**
 * Builds the bridge request from a validated body. `system` is prepended and
 * `prompt` appended as a user turn; the non-empty check is left to the bridge.
 */
export function toCompletionRequest(body: CompletionBody): CompletionRequest {
  const messages: ChatMessage[] = [
    ...(body.system ? [{ role: "system" as const, content: body.system }] : []),
    ...(body.messages ?? []),
    ...(body.prompt ? [{ role: "user" as const, content: body.prompt }] : []),
  ];

  return {
    model: body.model,
    messages,
    temperature: body.temperature,
    maxTokens: body.max_tokens,
    topP: body.top_p,
    stop: typeof body.stop === "string" ? [body.stop] : body.stop,
  };
}

export function parseCompletionBody(body: unknown): CompletionRequest {
  const parsed = completionBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError(describeIssues(parsed.error));
  }
  return toCompletionRequest(parsed.data);
}

export function parseAsyncCompletionBody(
  body: unknown,
): { request: CompletionRequest; webhooks: string[] } {
  const parsed = asyncCompletionBodySchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError(describeIssues(parsed.error));
  }
  return {
    request: toCompletionRequest(parsed.data),
    webhooks: parsed.data.webhooks,
  };
}
