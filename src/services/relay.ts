import type { FastifyBaseLogger } from "fastify";
import type { AlertProvider } from "../types/config.js";
import type { EndpointEvent } from "../types/endpoint.js";
import { getDefaultAlert, withDefaultAlert } from "../alertmanager/resolver.js";
import { send, type SendOptions } from "../alertmanager/provider.js";
import { ConfigurationError, OverrideParseError, type AlertmanagerError, isAlertmanagerError } from "../errors.js";
import { inc } from "../metrics.js";

export type RelayOutcome =
  | { status: "sent" }
  | { status: "skipped"; reason: "alert_disabled" | "resolved_not_sent" }
  | { status: "failed"; error: AlertmanagerError };

export function isConfigError(err: AlertmanagerError): boolean {
  return err instanceof ConfigurationError || err instanceof OverrideParseError;
}

/**
 * Deliver one endpoint state change to Alertmanager. Applies the provider's default alert, honours
 * `enabled` and `send-on-resolved`, logs and counts the outcome.
 * Provider failures come back as `{ status: "failed" }`; anything else propagates.
 */
export async function relayEndpointEvent(
  event: EndpointEvent,
  provider: AlertProvider,
  log: FastifyBaseLogger,
  options: SendOptions = {}
): Promise<RelayOutcome> {
  const { endpoint, result, resolved } = event;
  const alert = withDefaultAlert(event.alert, getDefaultAlert(provider));
  const ctx = { component: "relay", endpoint: endpoint.name, group: endpoint.group, resolved };
  inc("alerts_received_total");

  if (alert.enabled === false) {
    inc("alerts_skipped_total");
    log.debug({ ...ctx, event: "skipped", reason: "alert_disabled" }, "alert_skipped_disabled");
    return { status: "skipped", reason: "alert_disabled" };
  }
  if (resolved && alert.sendOnResolved === false) {
    inc("alerts_skipped_total");
    log.debug({ ...ctx, event: "skipped", reason: "resolved_not_sent" }, "alert_skipped_resolved");
    return { status: "skipped", reason: "resolved_not_sent" };
  }

  try {
    await send(provider, endpoint, alert, result, resolved, options);
    inc("alerts_sent_total");
    log.info({ ...ctx, event: "alert_sent", errors: result.errors.length }, "alert_sent");
    return { status: "sent" };
  } catch (err) {
    if (!isAlertmanagerError(err)) throw err;
    if (isConfigError(err)) {
      inc("config_errors_total");
      log.warn({ ...ctx, event: "config_invalid", code: err.code, err }, "alert_config_invalid");
    } else {
      inc("delivery_errors_total");
      log.error({ ...ctx, event: "alert_failed", code: err.code, err }, "alert_failed");
    }
    return { status: "failed", error: err };
  }
}
