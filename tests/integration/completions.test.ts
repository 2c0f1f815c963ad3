import { describe, it, expect, vi } from "vitest";
import request from "supertest";
import { createApp } from "../../src/app.js";
import { config } from "../../src/config/index.js";
import { AsyncCompletionBridge } from "../../src/services/completionBridge.js";
import { BackgroundTasks } from "../../src/services/backgroundTasks.js";
import { WebhookDispatcher } from "../../src/services/webhookDispatcher.js";
import { UpstreamRejectedError } from "../../src/middleware/error-handler.js";
import type { WebhookPayload } from "../../src/types/http.js";
import { FakeProvider, echoCompletion, hang, sleep } from "../helpers/fake-provider.js";

// ── Helpers ─────────────────────────────────────────────────────────────────

function buildApp(provider = new FakeProvider(), timeoutMs = 1_000) {
  const webhookFetch = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
  const tasks = new BackgroundTasks();
  const bridge = new AsyncCompletionBridge(provider, {
    defaultModel: config.provider.defaultModel,
    timeoutMs,
  });
  const webhooks = new WebhookDispatcher({ timeoutMs: 1_000, fetch: webhookFetch });
  const app = createApp({ config, bridge, webhooks, tasks });
  return { app, provider, tasks, webhookFetch };
}

function deliveredPayloads(webhookFetch: ReturnType<typeof buildApp>["webhookFetch"]) {
  return webhookFetch.mock.calls.map(([url, init]) => ({
    url: String(url),
    payload: JSON.parse(String(init?.body)) as WebhookPayload,
  }));
}

// ── POST /v1/completions ────────────────────────────────────────────────────

describe("POST /v1/completions", () => {
  it("returns the normalized completion", async () => {
    const { app, provider } = buildApp();

    const res = await request(app)
      .post("/v1/completions")
      .send({ prompt: "hello" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      id: "cmpl-test",
      object: "completion",
      created: 1_700_000_000,
      model: "test-default-model",
      text: "echo: hello",
      finish_reason: "stop",
      usage: { prompt_tokens: 11, completion_tokens: 7, total_tokens: 18 },
    });
    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f-]{36}$/);
    expect(provider.calls[0].model).toBe("test-default-model");
  });

  it("echoes a caller-supplied request id", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/v1/completions")
      .set("X-Request-Id", "req-123")
      .send({ messages: [{ role: "user", content: "hi" }], model: "chosen-model" });

    expect(res.status).toBe(200);
    expect(res.headers["x-request-id"]).toBe("req-123");
    expect(res.body.model).toBe("chosen-model");
  });

  it("rejects an empty message sequence without calling upstream", async () => {
    const { app, provider } = buildApp();

    const res = await request(app)
      .post("/v1/completions")
      .set("X-Request-Id", "req-empty")
      .send({ messages: [] });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: {
        message: "messages must contain at least one message",
        type: "InvalidRequest",
        code: "invalid_request",
        requestId: "req-empty",
      },
    });
    expect(provider.calls).toHaveLength(0);
  });

  it("rejects malformed JSON", async () => {
    const { app, provider } = buildApp();

    const res = await request(app)
      .post("/v1/completions")
      .set("Content-Type", "application/json")
      .send("{\"prompt\":");

    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe("invalid_request");
    expect(provider.calls).toHaveLength(0);
  });

  it("rejects invalid generation parameters", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/v1/completions")
      .send({ prompt: "x", max_tokens: 0 });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("max_tokens: Number must be greater than 0");
  });

  it("answers 504 when the upstream exceeds the time budget", async () => {
    const { app } = buildApp(new FakeProvider(() => hang()), 50);

    const res = await request(app)
      .post("/v1/completions")
      .send({ prompt: "slow" });

    expect(res.status).toBe(504);
    expect(res.body.error).toMatchObject({
      code: "upstream_timeout",
      type: "UpstreamTimeout",
      message: "Upstream provider did not respond within 50ms",
    });
  });

  it("answers 502 with the upstream message when the upstream rejects", async () => {
    const provider = new FakeProvider(async () => {
      throw new UpstreamRejectedError("Rate limit reached for requests", "upstream_rejected", 429);
    });
    const { app } = buildApp(provider);

    const res = await request(app)
      .post("/v1/completions")
      .send({ prompt: "hi" });

    expect(res.status).toBe(502);
    expect(res.body.error).toMatchObject({
      code: "upstream_rejected",
      message: "Rate limit reached for requests",
    });
  });

  it("serves concurrent requests independently", async () => {
    const provider = new FakeProvider(async (params) => {
      await sleep(Math.floor(Math.random() * 20));
      return echoCompletion(params);
    });
    const { app } = buildApp(provider);
    const prompts = Array.from({ length: 8 }, (_, i) => `prompt-${i}`);

    const responses = await Promise.all(
      prompts.map((prompt) => request(app).post("/v1/completions").send({ prompt })),
    );

    expect(responses.map((r) => r.status)).toEqual(prompts.map(() => 200));
    expect(responses.map((r) => r.body.text)).toEqual(prompts.map((p) => `echo: ${p}`));
  });
});

// ── POST /v1/completions/async ──────────────────────────────────────────────

describe("POST /v1/completions/async", () => {
  it("accepts at once and delivers the completion to every webhook", async () => {
    const { app, tasks, webhookFetch } = buildApp();

    const res = await request(app)
      .post("/v1/completions/async")
      .set("X-Request-Id", "req-async")
      .send({ prompt: "later", webhooks: ["http://hooks.test/a", "http://hooks.test/b"] });

    expect(res.status).toBe(202);
    expect(res.body).toEqual({ status: "accepted", request_id: "req-async" });

    await tasks.drain();

    const deliveries = deliveredPayloads(webhookFetch);
    expect(deliveries.map((d) => d.url)).toEqual(["http://hooks.test/a", "http://hooks.test/b"]);
    expect(deliveries[0].payload).toEqual({
      request_id: "req-async",
      status_code: 200,
      data: {
        id: "cmpl-test",
        object: "completion",
        created: 1_700_000_000,
        model: "test-default-model",
        text: "echo: later",
        finish_reason: "stop",
        usage: { prompt_tokens: 11, completion_tokens: 7, total_tokens: 18 },
      },
    });
    expect(deliveries[1].payload).toEqual(deliveries[0].payload);
  });

  it("delivers the normalized error when the upstream fails", async () => {
    const provider = new FakeProvider(async () => {
      throw new UpstreamRejectedError("Invalid model");
    });
    const { app, tasks, webhookFetch } = buildApp(provider);

    await request(app)
      .post("/v1/completions/async")
      .set("X-Request-Id", "req-fail")
      .send({ prompt: "x", webhooks: ["http://hooks.test/a"] })
      .expect(202);
    await tasks.drain();

    expect(deliveredPayloads(webhookFetch)[0].payload).toEqual({
      request_id: "req-fail",
      status_code: 502,
      data: {
        error: {
          message: "Invalid model",
          type: "UpstreamRejected",
          code: "upstream_rejected",
          requestId: "req-fail",
        },
      },
    });
  });

  it("rejects an empty message sequence before accepting", async () => {
    const { app, tasks, provider, webhookFetch } = buildApp();

    const res = await request(app)
      .post("/v1/completions/async")
      .send({ messages: [], webhooks: ["http://hooks.test/a"] });

    expect(res.status).toBe(400);
    expect(tasks.size).toBe(0);
    expect(provider.calls).toHaveLength(0);
    expect(webhookFetch).not.toHaveBeenCalled();
  });

  it("rejects a request without webhooks", async () => {
    const { app } = buildApp();

    const res = await request(app)
      .post("/v1/completions/async")
      .send({ prompt: "x" });

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("webhooks: Required");
  });
});

// ── Ancillary routes ────────────────────────────────────────────────────────

describe("GET /health", () => {
  it("reports status and pending background work", async () => {
    const { app } = buildApp();

    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body.status).toBe("ok");
    expect(res.body.pendingTasks).toBe(0);
  });
});

describe("GET /openapi.json", () => {
  it("serves the document generated from the request schemas", async () => {
    const { app } = buildApp();

    const res = await request(app).get("/openapi.json");

    expect(res.status).toBe(200);
    expect(res.body.openapi).toBe("3.1.0");
    expect(Object.keys(res.body.paths)).toEqual([
      "/v1/completions",
      "/v1/completions/async",
      "/health",
      "/openapi.json",
    ]);
    const body = res.body.components.schemas.CompletionRequest;
    expect(body.properties.model).toMatchObject({ type: "string", minLength: 1 });
    expect(body.properties.temperature).toMatchObject({ minimum: 0, maximum: 2 });
    expect(Object.keys(res.body.paths["/v1/completions"].post.responses)).toEqual([
      "200", "400", "413", "499", "502", "504",
    ]);
  });
});

describe("GET /docs", () => {
  it("serves the browsable UI", async () => {
    const { app } = buildApp();

    const res = await request(app).get("/docs/");

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/text\/html/);
    expect(res.text).toContain('<div id="swagger-ui"></div>');
  });
});
