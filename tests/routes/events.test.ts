import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../src/services/config.js", () => ({
  getProvider: vi.fn(),
}));
vi.mock("../../src/services/relay.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/services/relay.js")>();
  return { ...actual, relayEndpointEvent: vi.fn() };
});

import Fastify from "fastify";
import { registerEventsRoutes } from "../../src/routes/events.js";
import * as configSvc from "../../src/services/config.js";
import * as relay from "../../src/services/relay.js";
import { ConfigurationError, RemoteRejectionError, TransportError } from "../../src/errors.js";
import type { AlertProvider } from "../../src/types/config.js";

const provider: AlertProvider = { defaultConfig: { url: "http://am:9093" }, overrides: [] };

const validBody = {
  endpoint: { name: "api", url: "https://api/health", group: "core" },
  alert: { description: "API down", "send-on-resolved": true, "provider-override": { "default-severity": "warning" } },
  result: { success: false, errors: ["timeout"] },
  resolved: false,
};

async function buildApp() {
  const app = Fastify({ logger: false });
  await registerEventsRoutes(app);
  return app;
}

let savedAuthToken: string | undefined;

beforeEach(() => {
  savedAuthToken = process.env.AUTH_TOKEN;
  delete process.env.AUTH_TOKEN;
  vi.mocked(configSvc.getProvider).mockReturnValue(provider);
  vi.mocked(relay.relayEndpointEvent).mockResolvedValue({ status: "sent" });
});

afterEach(() => {
  if (savedAuthToken === undefined) delete process.env.AUTH_TOKEN;
  else process.env.AUTH_TOKEN = savedAuthToken;
  vi.clearAllMocks();
});

describe("POST /events", () => {
  it("relays a valid event and reports it sent", async () => {
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ ok: true, status: "sent" });
    expect(relay.relayEndpointEvent).toHaveBeenCalledWith(
      {
        endpoint: { name: "api", url: "https://api/health", group: "core" },
        alert: { description: "API down", sendOnResolved: true, providerOverride: { "default-severity": "warning" } },
        result: { success: false, errors: ["timeout"] },
        resolved: false,
      },
      provider,
      expect.anything()
    );
  });

  it("defaults missing result errors to an empty list", async () => {
    const app = await buildApp();
    await app.inject({
      method: "POST",
      url: "/events",
      payload: { endpoint: { name: "api", url: "https://api/health" }, result: { success: true }, resolved: true },
    });
    const event = vi.mocked(relay.relayEndpointEvent).mock.calls[0][0];
    expect(event.result.errors).toEqual([]);
    expect(event.alert).toBeUndefined();
  });

  it("returns 400 for an invalid body", async () => {
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: { endpoint: { name: "api" }, resolved: "yes" } });
    expect(res.statusCode).toBe(400);
    const body = JSON.parse(res.body);
    expect(body.ok).toBe(false);
    expect(body.error).toContain("endpoint.url");
    expect(relay.relayEndpointEvent).not.toHaveBeenCalled();
  });

  it("returns 503 when no provider is configured", async () => {
    vi.mocked(configSvc.getProvider).mockReturnValue(null);
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(503);
  });

  it("reports skipped events", async () => {
    vi.mocked(relay.relayEndpointEvent).mockResolvedValue({ status: "skipped", reason: "alert_disabled" });
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ ok: true, status: "skipped", reason: "alert_disabled" });
  });

  it("maps configuration errors to 422", async () => {
    vi.mocked(relay.relayEndpointEvent).mockResolvedValue({
      status: "failed",
      error: new ConfigurationError("alertmanager URL not set"),
    });
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(422);
    expect(JSON.parse(res.body)).toEqual({ ok: false, code: "CONFIGURATION", error: "alertmanager URL not set" });
  });

  it("maps remote rejections to 502 with the upstream status", async () => {
    vi.mocked(relay.relayEndpointEvent).mockResolvedValue({
      status: "failed",
      error: new RemoteRejectionError(503, "unavailable"),
    });
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(502);
    expect(JSON.parse(res.body)).toEqual({
      ok: false,
      code: "REMOTE_REJECTION",
      error: "Alertmanager returned status 503: unavailable",
      upstreamStatus: 503,
    });
  });

  it("maps transport errors to 502", async () => {
    vi.mocked(relay.relayEndpointEvent).mockResolvedValue({
      status: "failed",
      error: new TransportError(new Error("fetch failed")),
    });
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(502);
    expect(JSON.parse(res.body).code).toBe("TRANSPORT");
  });

  it("answers 500 when the relay throws an unexpected error", async () => {
    vi.mocked(relay.relayEndpointEvent).mockRejectedValue(new RangeError("bug"));
    const app = await buildApp();
    const res = await app.inject({ method: "POST", url: "/events", payload: validBody });
    expect(res.statusCode).toBe(500);
  });

  it("returns 401 when AUTH_TOKEN is set and the token is wrong", async () => {
    process.env.AUTH_TOKEN = "test-secret";
    const app = await buildApp();
    const res = await app.inject({
      method: "POST",
      url: "/events",
      payload: validBody,
      headers: { Authorization: "Bearer wrong" },
    });
    expect(res.statusCode).toBe(401);
    expect(relay.relayEndpointEvent).not.toHaveBeenCalled();
  });

  it("accepts the correct bearer token", async () => {
    process.env.AUTH_TOKEN = "test-secret";
    const app = await buildApp();
    const res = await app.inject({
      method: "POST",
      url: "/events",
      payload: validBody,
      headers: { Authorization: "Bearer test-secret" },
    });
    expect(res.statusCode).toBe(200);
  });
});
