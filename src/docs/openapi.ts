import {
  extendZodWithOpenApi,
  OpenAPIRegistry,
  OpenApiGeneratorV31,
} from "@asteasolutions/zod-to-openapi";
import { z } from "zod";
import {
  asyncCompletionBodySchema,
  completionBodySchema,
} from "../services/requestParser.js";
import type { ErrorResponse, HealthResponse } from "../types/common.js";
import type {
  AcceptedResponseBody,
  CompletionResponseBody,
  WebhookPayload,
} from "../types/http.js";

extendZodWithOpenApi(z);

// ── Response schemas ────────────────────────────────────────────────────────
// Tied to the wire types so the document cannot drift from what is sent.

const completionResponseSchema = z.object({
  id: z.string(),
  object: z.literal("completion"),
  created: z.number().int(),
  model: z.string(),
  text: z.string(),
  finish_reason: z.enum(["stop", "length", "error"]),
  usage: z.object({
    prompt_tokens: z.number().int(),
    completion_tokens: z.number().int(),
    total_tokens: z.number().int(),
  }),
}) satisfies z.ZodType<CompletionResponseBody>;

const errorResponseSchema = z.object({
  error: z.object({
    message: z.string(),
    type: z.string(),
    code: z.union([z.string(), z.number()]),
    requestId: z.string(),
  }),
}) satisfies z.ZodType<ErrorResponse>;

const acceptedResponseSchema = z.object({
  status: z.literal("accepted"),
  request_id: z.string(),
}) satisfies z.ZodType<AcceptedResponseBody>;

const healthResponseSchema = z.object({
  status: z.enum(["ok", "degraded"]),
  version: z.string(),
  uptime: z.number().int(),
  pendingTasks: z.number().int(),
}) satisfies z.ZodType<HealthResponse>;

function jsonContent(schema: z.ZodTypeAny) {
  return { "application/json": { schema } };
}

/** Builds the OpenAPI 3.1 document from the same zod schemas that validate requests. */
export function buildOpenApiDocument(version: string) {
  const registry = new OpenAPIRegistry();

  const completionRequest = registry.register("CompletionRequest", completionBodySchema);
  const asyncCompletionRequest = registry.register("AsyncCompletionRequest", asyncCompletionBodySchema);
  const completionResponse = registry.register("CompletionResponse", completionResponseSchema);
  const errorResponse = registry.register("ErrorResponse", errorResponseSchema);
  registry.register(
    "WebhookPayload",
    z.object({
      request_id: z.string(),
      status_code: z.number().int(),
      data: z.union([completionResponse, errorResponse]),
    }) satisfies z.ZodType<WebhookPayload>,
  );

  const errorResponses = (statuses: Record<number, string>) =>
    Object.fromEntries(
      Object.entries(statuses).map(([status, description]) => [
        status,
        { description, content: jsonContent(errorResponse) },
      ]),
    );

  registry.registerPath({
    method: "post",
    path: "/v1/completions",
    summary: "Run a completion and wait for the result",
    request: { body: { required: true, content: jsonContent(completionRequest) } },
    responses: {
      200: { description: "Completion", content: jsonContent(completionResponse) },
      ...errorResponses({
        400: "Invalid body or empty message sequence",
        413: "Body exceeds JSON_BODY_LIMIT",
        499: "Client closed the connection; the upstream call was cancelled",
        502: "Upstream rejected the call or was unreachable",
        504: "Upstream did not answer within UPSTREAM_TIMEOUT_MS",
      }),
    },
  });

  registry.registerPath({
    method: "post",
    path: "/v1/completions/async",
    summary: "Accept a completion and deliver the result to webhooks",
    description:
      "Each webhook receives one POST with a WebhookPayload: the completion on success, the error body otherwise.",
    request: { body: { required: true, content: jsonContent(asyncCompletionRequest) } },
    responses: {
      202: { description: "Accepted", content: jsonContent(acceptedResponseSchema) },
      ...errorResponses({
        400: "Invalid body, webhook list or empty message sequence",
        413: "Body exceeds JSON_BODY_LIMIT",
      }),
    },
  });

  registry.registerPath({
    method: "get",
    path: "/health",
    summary: "Liveness",
    responses: {
      200: { description: "Service status", content: jsonContent(healthResponseSchema) },
    },
  });

  registry.registerPath({
    method: "get",
    path: "/openapi.json",
    summary: "This document",
    responses: {
      200: { description: "OpenAPI 3.1 document", content: jsonContent(z.object({}).passthrough()) },
    },
  });

  return new OpenApiGeneratorV31(registry.definitions).generateDocument({
    openapi: "3.1.0",
    info: {
      title: "Async Completion Bridge",
      version,
      description:
        "Turns one HTTP request into one asynchronous chat completion call against an OpenAI-compatible API.",
    },
  });
}
