import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { requireAuth } from "./auth.js";
import { getProvider, reloadProviderSafe } from "../services/config.js";
import { getConfig } from "../alertmanager/resolver.js";
import { alertsUrl } from "../alertmanager/client.js";
import { formatDuration } from "../types/duration.js";
import { isAlertmanagerError } from "../errors.js";

export async function registerConfigRoutes(app: FastifyInstance): Promise<void> {
  /** GET /config?group=prod: effective configuration for a routing group (no alert-level override). */
  app.get<{ Querystring: { group?: string } }>(
    "/config",
    async (req: FastifyRequest<{ Querystring: { group?: string } }>, reply: FastifyReply) => {
      if (!requireAuth(req, reply)) return;
      const provider = getProvider();
      if (!provider) {
        return reply.status(503).send({ ok: false, error: "Alertmanager provider is not configured" });
      }
      const group = req.query.group?.trim() ?? "";
      try {
        const cfg = getConfig(provider, group);
        req.log.info({ component: "http", route: "GET /config", event: "get", group }, "get_config_ok");
        return reply.send({
          ok: true,
          group,
          config: {
            url: cfg.url,
            alertsUrl: alertsUrl(cfg.url),
            timeout: formatDuration(cfg.timeoutMs),
            defaultSeverity: cfg.defaultSeverity,
            extraLabels: cfg.extraLabels ?? {},
            extraAnnotations: cfg.extraAnnotations ?? {},
          },
        });
      } catch (err) {
        if (!isAlertmanagerError(err)) throw err;
        req.log.warn({ component: "http", route: "GET /config", event: "config_invalid", group, err }, "get_config_invalid");
        return reply.status(422).send({ ok: false, code: err.code, error: err.message });
      }
    }
  );

  /** Reload the provider config file without restart */
  const handleReload = async (req: FastifyRequest, reply: FastifyReply) => {
    if (!requireAuth(req, reply)) return;
    const result = reloadProviderSafe();
    if (!result.ok) {
      req.log.warn({ component: "http", route: "reload", event: "reload_failed", error: result.error }, "config_reload_failed");
      return reply.status(400).send({ ok: false, error: result.error });
    }
    const overrides = result.provider.overrides.length;
    req.log.info({ component: "http", route: "reload", event: "reloaded", overrides }, "config_reloaded");
    return reply.send({ ok: true, overrides });
  };

  app.get("/reload", handleReload);
  app.post("/reload", handleReload);
}
