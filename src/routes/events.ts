import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { endpointEventSchema } from "../types/endpoint.js";
import { formatConfigIssues } from "../types/config.js";
import { getProvider } from "../services/config.js";
import { isConfigError, relayEndpointEvent } from "../services/relay.js";
import { RemoteRejectionError } from "../errors.js";
import { requireAuth } from "./auth.js";

export async function registerEventsRoutes(app: FastifyInstance): Promise<void> {
  /**
   * Health-check scheduler callback: POST /events with one endpoint state change.
   * Delivery happens within the request so the caller sees the outcome (and owns any retry).
   */
  app.post<{ Body: unknown }>("/events", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    if (!requireAuth(req, reply)) return;
    const parsed = endpointEventSchema.safeParse(req.body);
    if (!parsed.success) {
      const error = formatConfigIssues(parsed.error);
      req.log.warn({ component: "http", route: "POST /events", event: "validation_failed", error }, "event_validation_failed");
      return reply.status(400).send({ ok: false, error });
    }
    const provider = getProvider();
    if (!provider) {
      req.log.warn({ component: "http", route: "POST /events", event: "unavailable", reason: "no_config" }, "event_no_provider_config");
      return reply.status(503).send({ ok: false, error: "Alertmanager provider is not configured" });
    }

    const outcome = await relayEndpointEvent(parsed.data, provider, req.log);
    switch (outcome.status) {
      case "sent":
        return reply.send({ ok: true, status: "sent" });
      case "skipped":
        return reply.send({ ok: true, status: "skipped", reason: outcome.reason });
      case "failed": {
        const { error } = outcome;
        const status = isConfigError(error) ? 422 : 502;
        const upstream = error instanceof RemoteRejectionError ? { upstreamStatus: error.status } : {};
        return reply.status(status).send({ ok: false, code: error.code, error: error.message, ...upstream });
      }
    }
  });
}
