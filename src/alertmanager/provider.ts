import type { AlertDefinition, AlertProvider } from "../types/config.js";
import type { CheckResult, Endpoint } from "../types/endpoint.js";
import { getHttpClient, sendToAlertmanager, type HttpClientFactory } from "./client.js";
import { buildAlert } from "./payload.js";
import { getConfig } from "./resolver.js";

export interface SendOptions {
  clientFactory?: HttpClientFactory;
  /** Clock for startsAt/endsAt */
  now?: () => Date;
}

/**
 * Resolve the effective config for the endpoint's group and the alert, build one alert and
 * deliver it. Configuration errors reject before any request is made.
 */
export async function send(
  provider: AlertProvider,
  endpoint: Endpoint,
  alert: AlertDefinition | undefined,
  result: CheckResult,
  resolved: boolean,
  options: SendOptions = {}
): Promise<void> {
  const cfg = getConfig(provider, endpoint.group ?? "", alert);
  const payload = buildAlert(cfg, endpoint, alert, result, resolved, options.now?.() ?? new Date());
  await sendToAlertmanager(cfg, [payload], options.clientFactory ?? getHttpClient);
}
