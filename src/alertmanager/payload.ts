import {
  ALERT_JOB,
  ALERT_NAME,
  type AlertmanagerAlert,
  type WireAlert,
} from "../types/alertmanager.js";
import type { AlertDefinition, EffectiveConfig } from "../types/config.js";
import type { CheckResult, Endpoint } from "../types/endpoint.js";

/**
 * Build the Alertmanager alert for one endpoint state change. Extra labels and annotations from
 * the config are applied last and may replace the fixed keys (alertname, severity, summary, ...).
 */
export function buildAlert(
  cfg: EffectiveConfig,
  endpoint: Endpoint,
  alert: AlertDefinition | undefined,
  result: CheckResult,
  resolved: boolean,
  now: Date = new Date()
): AlertmanagerAlert {
  const labels: Record<string, string> = {
    alertname: ALERT_NAME,
    instance: endpoint.url,
    job: ALERT_JOB,
    severity: cfg.defaultSeverity,
    endpoint: endpoint.name,
  };
  if (endpoint.group) labels.group = endpoint.group;
  Object.assign(labels, cfg.extraLabels);

  const annotations: Record<string, string> = {};
  let endsAt: Date | undefined;
  if (resolved) {
    annotations.summary = `Endpoint ${endpoint.name} is now healthy`;
    annotations.description = `Endpoint ${endpoint.name} (${endpoint.url}) has recovered and is now passing health checks`;
    endsAt = now;
  } else {
    annotations.summary = `Endpoint ${endpoint.name} is down`;
    let description = `Endpoint ${endpoint.name} (${endpoint.url}) has failed health checks`;
    if (result.errors.length > 0) {
      description += `. Errors: ${result.errors.join(", ")}`;
    }
    annotations.description = description;
  }

  if (alert?.description) annotations.alert_description = alert.description;
  Object.assign(annotations, cfg.extraAnnotations);

  const payload: AlertmanagerAlert = { labels, annotations, startsAt: now };
  if (endsAt) payload.endsAt = endsAt;
  return payload;
}

/** JSON shape for POST /api/v2/alerts; endsAt is omitted while the alert is firing. */
export function toWireAlert(alert: AlertmanagerAlert): WireAlert {
  const wire: WireAlert = {
    labels: alert.labels,
    annotations: alert.annotations,
    startsAt: alert.startsAt.toISOString(),
  };
  if (alert.endsAt) wire.endsAt = alert.endsAt.toISOString();
  return wire;
}
