import Fastify from "fastify";
import { validateEnv } from "../env.js";
import { createLoggerOptions } from "../logger.js";
import { registerHarnessRoutes } from "./routes.js";

validateEnv();

const port = Number(process.env.HARNESS_PORT) || 8082;

const app = Fastify({ logger: createLoggerOptions("test-harness") });

await registerHarnessRoutes(app);

try {
  await app.listen({ port, host: "0.0.0.0" });
  app.log.info({ component: "harness", event: "listening", port }, "harness_listening");
} catch (err) {
  app.log.fatal({ component: "harness", event: "listen_failed", err, port }, "harness_listen_failed");
  process.exit(1);
}
