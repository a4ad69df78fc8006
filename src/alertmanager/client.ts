import { RemoteRejectionError, SerializationError, TransportError } from "../errors.js";
import { ALERTS_API_PATH, type AlertmanagerAlert } from "../types/alertmanager.js";
import type { ClientConfig, EffectiveConfig } from "../types/config.js";
import { toWireAlert } from "./payload.js";

const DEFAULT_CLIENT_TIMEOUT_MS = 10_000;

export interface HttpClient {
  /** Applied to each request; callers may raise or lower it before issuing one */
  timeoutMs: number;
  request(url: string, init: RequestInit): Promise<Response>;
}

export type HttpClientFactory = (config?: ClientConfig) => HttpClient;

/** fetch-backed client for the given transport settings. Each call returns an independent client. */
export const getHttpClient: HttpClientFactory = (config) => {
  const client: HttpClient = {
    timeoutMs: config?.timeoutMs ?? DEFAULT_CLIENT_TIMEOUT_MS,
    request: (url, init) =>
      fetch(url, {
        ...init,
        redirect: config?.ignoreRedirect ? "manual" : "follow",
        signal: AbortSignal.timeout(client.timeoutMs),
      }),
  };
  return client;
};

/** Trim one trailing slash and append /api/v2/alerts unless the URL already ends with it. */
export function alertsUrl(base: string): string {
  const url = base.endsWith("/") ? base.slice(0, -1) : base;
  return url.endsWith(ALERTS_API_PATH) ? url : `${url}${ALERTS_API_PATH}`;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/**
 * POST alerts to Alertmanager. Resolves on 2xx; rejects with SerializationError, TransportError
 * (no response) or RemoteRejectionError (status and body attached). No retries.
 */
export async function sendToAlertmanager(
  cfg: EffectiveConfig,
  alerts: AlertmanagerAlert[],
  clientFactory: HttpClientFactory = getHttpClient
): Promise<void> {
  let body: string;
  try {
    body = JSON.stringify(alerts.map(toWireAlert));
  } catch (err) {
    throw new SerializationError(err);
  }

  const client = clientFactory(cfg.client);
  if (cfg.timeoutMs > 0) client.timeoutMs = cfg.timeoutMs;

  let response: Response;
  try {
    response = await client.request(alertsUrl(cfg.url), {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body,
    });
  } catch (err) {
    throw new TransportError(err);
  }

  try {
    if (!isSuccess(response.status)) {
      let text = "";
      let readError: unknown;
      try {
        text = await response.text();
      } catch (err) {
        readError = err;
      }
      throw new RemoteRejectionError(response.status, text, readError);
    }
  } finally {
    // release the connection whether or not the body was consumed. An errored stream (timeout after
    // headers) rejects cancel() but holds no connection; the status already decided the outcome.
    if (!response.bodyUsed) await response.body?.cancel().catch(() => undefined);
  }
}
