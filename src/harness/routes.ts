import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import {
  EndpointStateStore,
  endpointStateUpdateSchema,
  minuteBasedHealthy,
  secondBasedHealthy,
} from "./state.js";

export interface HarnessOptions {
  store?: EndpointStateStore;
  now?: () => Date;
}

type EndpointParams = { Params: { endpoint: string } };

export async function registerHarnessRoutes(app: FastifyInstance, options: HarnessOptions = {}): Promise<void> {
  const store = options.store ?? new EndpointStateStore();
  const now = options.now ?? (() => new Date());

  app.get("/", async (_, reply) => {
    return reply.send({ service: "test-harness", endpoints: store.names() });
  });

  /** GET /control/: every endpoint with its state */
  app.get("/control/", async (_, reply) => {
    return reply.send(store.snapshot());
  });

  /** POST /control/:endpoint: set (or create) an endpoint's state */
  app.post<EndpointParams & { Body: unknown }>(
    "/control/:endpoint",
    async (req: FastifyRequest<EndpointParams & { Body: unknown }>, reply: FastifyReply) => {
      const parsed = endpointStateUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: "Body must be { healthy: boolean, status?: number, message?: string }" });
      }
      const state = store.set(req.params.endpoint, parsed.data);
      req.log.info({ component: "harness", event: "state_changed", endpoint: req.params.endpoint, ...state }, "endpoint_state_changed");
      return reply.send({ endpoint: req.params.endpoint, ...state });
    }
  );

  /** GET /health/:endpoint: answers with the endpoint's configured status */
  app.get<EndpointParams>("/health/:endpoint", async (req: FastifyRequest<EndpointParams>, reply: FastifyReply) => {
    const state = store.get(req.params.endpoint);
    if (!state) {
      return reply.status(404).send({ error: `Unknown endpoint: ${req.params.endpoint}` });
    }
    return reply.status(state.status).send({ endpoint: req.params.endpoint, ...state });
  });

  app.get("/time-based", async (_, reply) => {
    const at = now();
    const healthy = minuteBasedHealthy(at);
    return reply.status(healthy ? 200 : 503).send({
      healthy,
      minute: at.getMinutes(),
      message: healthy ? "Odd minute - passing" : "Even minute - failing",
      time: at.toISOString(),
    });
  });

  app.get("/second-based", async (_, reply) => {
    const at = now();
    const healthy = secondBasedHealthy(at);
    return reply.status(healthy ? 200 : 503).send({
      healthy,
      second: at.getSeconds(),
      message: healthy ? "Second >= 20 - passing" : "Second < 20 - failing",
      time: at.toISOString(),
    });
  });
}
