import pino from "pino";
import { RemoteRejectionError } from "./errors.js";

const LOG_LEVEL = process.env.LOG_LEVEL ?? "info";
const NODE_ENV = process.env.NODE_ENV ?? "development";

/** Serialize errors with message, stack, type, code and (for rejections) the HTTP status */
function serializeErr(err: unknown): object {
  if (err instanceof Error) {
    const code = "code" in err && typeof err.code === "string" ? { code: err.code } : {};
    const status = err instanceof RemoteRejectionError ? { status: err.status } : {};
    const cause = err.cause instanceof Error ? { cause: err.cause.message } : {};
    return {
      type: err.name || "Error",
      message: err.message,
      stack: err.stack,
      ...code,
      ...status,
      ...cause,
    };
  }
  if (typeof err === "object" && err !== null) {
    return { type: "Object", raw: err };
  }
  return { type: typeof err, value: err };
}

/** Redact sensitive keys from any object (nested). Keys are case-insensitive. */
const SENSITIVE_KEYS = ["token", "authorization", "cookie", "password", "secret", "api_key", "apikey", "auth_token"];
const SENSITIVE_PATTERN = new RegExp(SENSITIVE_KEYS.join("|"), "i");

function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (Array.isArray(obj)) return obj.map(redact);
  if (typeof obj === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      out[k] = SENSITIVE_PATTERN.test(k) ? "[REDACTED]" : redact(v);
    }
    return out;
  }
  return obj;
}

function redactRecord(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    out[k] = SENSITIVE_PATTERN.test(k) ? "[REDACTED]" : redact(v);
  }
  return out;
}

/** Pino options compatible with Fastify's logger (configuration object only). */
export type LoggerOptions = pino.LoggerOptions;

/** Create logger options for Fastify. Fastify creates the logger from this; do not pass a pino instance. */
export function createLoggerOptions(service = "alertmanager-notifier"): LoggerOptions {
  const options: LoggerOptions = {
    level: LOG_LEVEL,
    base: { service, env: NODE_ENV },
    serializers: {
      err: (err: unknown) => serializeErr(err),
      error: (err: unknown) => serializeErr(err),
    },
    formatters: {
      level: (label) => ({ level: label }),
      bindings: (bindings) => redactRecord(bindings),
    },
    redact: {
      paths: ["req.headers.authorization", "req.headers.cookie", "*.token", "*.password"],
      censor: "[REDACTED]",
    },
  };
  if (NODE_ENV !== "production") {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        messageFormat: "{msg}",
        ignore: "pid,hostname,service,env",
      },
    };
  }
  return options;
}
