import { describe, it, expect } from "vitest";
import { buildAlert, toWireAlert } from "../../src/alertmanager/payload.js";
import type { EffectiveConfig } from "../../src/types/config.js";
import type { Endpoint } from "../../src/types/endpoint.js";

const NOW = new Date("2025-03-01T12:00:00.000Z");

const cfg: EffectiveConfig = {
  url: "http://alertmanager:9093",
  timeoutMs: 10_000,
  defaultSeverity: "warning",
  extraLabels: { environment: "test" },
  extraAnnotations: { runbook: "https://wiki.example.com/runbook" },
};

const endpoint: Endpoint = { name: "Test API", url: "https://api.example.com/health", group: "production" };

describe("buildAlert (firing)", () => {
  const alert = buildAlert(
    cfg,
    endpoint,
    { description: "API health check failed" },
    { success: false, errors: ["connection timeout", "DNS resolution failed"] },
    false,
    NOW
  );

  it("sets the fixed, group and extra labels", () => {
    expect(alert.labels).toEqual({
      alertname: "GatusEndpointDown",
      instance: "https://api.example.com/health",
      job: "gatus",
      severity: "warning",
      endpoint: "Test API",
      group: "production",
      environment: "test",
    });
  });

  it("describes the failure with the joined errors", () => {
    expect(alert.annotations).toEqual({
      summary: "Endpoint Test API is down",
      description:
        "Endpoint Test API (https://api.example.com/health) has failed health checks. Errors: connection timeout, DNS resolution failed",
      alert_description: "API health check failed",
      runbook: "https://wiki.example.com/runbook",
    });
  });

  it("starts now and has no end", () => {
    expect(alert.startsAt).toEqual(NOW);
    expect(alert.endsAt).toBeUndefined();
  });
});

describe("buildAlert (resolved)", () => {
  const alert = buildAlert(cfg, endpoint, undefined, { success: true, errors: ["stale error"] }, true, NOW);

  it("uses the recovery summary and description without errors", () => {
    expect(alert.annotations.summary).toBe("Endpoint Test API is now healthy");
    expect(alert.annotations.description).toBe(
      "Endpoint Test API (https://api.example.com/health) has recovered and is now passing health checks"
    );
    expect(alert.annotations.alert_description).toBeUndefined();
  });

  it("ends at the same instant it starts", () => {
    expect(alert.endsAt).toEqual(NOW);
    expect(alert.startsAt).toEqual(NOW);
  });
});

describe("buildAlert edge cases", () => {
  const plain: EffectiveConfig = { url: "http://am:9093", timeoutMs: 10_000, defaultSeverity: "critical" };

  it("omits the group label when the endpoint has no group", () => {
    const alert = buildAlert(plain, { name: "web", url: "https://web/" }, undefined, { success: false, errors: [] }, false, NOW);
    expect(alert.labels).not.toHaveProperty("group");
    expect(alert.annotations.description).toBe("Endpoint web (https://web/) has failed health checks");
  });

  it("ends the description with the joined errors", () => {
    const alert = buildAlert(plain, endpoint, undefined, { success: false, errors: ["timeout", "dns fail"] }, false, NOW);
    expect(alert.annotations.description.endsWith("Errors: timeout, dns fail")).toBe(true);
  });

  it("lets extra labels and annotations replace fixed keys", () => {
    const alert = buildAlert(
      { ...plain, extraLabels: { alertname: "Custom", severity: "page" }, extraAnnotations: { summary: "custom summary" } },
      endpoint,
      undefined,
      { success: false, errors: [] },
      false,
      NOW
    );
    expect(alert.labels.alertname).toBe("Custom");
    expect(alert.labels.severity).toBe("page");
    expect(alert.annotations.summary).toBe("custom summary");
  });

  it("skips an empty alert description", () => {
    const alert = buildAlert(plain, endpoint, { description: "" }, { success: false, errors: [] }, false, NOW);
    expect(alert.annotations).not.toHaveProperty("alert_description");
  });

  it("matches the reference firing alert for a grouped endpoint", () => {
    const alert = buildAlert(
      { url: "http://am:9093", timeoutMs: 10_000, defaultSeverity: "critical" },
      { name: "API", url: "https://api/health", group: "prod" },
      undefined,
      { success: false, errors: [] },
      false,
      NOW
    );
    expect(alert.labels).toEqual({
      alertname: "GatusEndpointDown",
      instance: "https://api/health",
      job: "gatus",
      severity: "critical",
      endpoint: "API",
      group: "prod",
    });
    expect(alert.annotations).toEqual({
      summary: "Endpoint API is down",
      description: "Endpoint API (https://api/health) has failed health checks",
    });
  });
});

describe("toWireAlert", () => {
  it("renders RFC3339 timestamps and omits endsAt while firing", () => {
    const firing = buildAlert(cfg, endpoint, undefined, { success: false, errors: [] }, false, NOW);
    const wire = toWireAlert(firing);
    expect(wire.startsAt).toBe("2025-03-01T12:00:00.000Z");
    expect(wire).not.toHaveProperty("endsAt");
    expect(Object.keys(JSON.parse(JSON.stringify(wire)))).toEqual(["labels", "annotations", "startsAt"]);
  });

  it("includes endsAt when resolved", () => {
    const resolved = buildAlert(cfg, endpoint, undefined, { success: true, errors: [] }, true, NOW);
    expect(toWireAlert(resolved).endsAt).toBe("2025-03-01T12:00:00.000Z");
  });
});
