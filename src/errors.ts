export type AlertmanagerErrorCode =
  | "CONFIGURATION"
  | "OVERRIDE_PARSE"
  | "SERIALIZATION"
  | "TRANSPORT"
  | "REMOTE_REJECTION";

/** Base class for every failure the Alertmanager provider surfaces to its caller. */
export class AlertmanagerError extends Error {
  readonly code: AlertmanagerErrorCode;

  constructor(code: AlertmanagerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No URL after all override layers were applied. */
export class ConfigurationError extends AlertmanagerError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}

/** The alert-level provider override does not match the provider config schema. */
export class OverrideParseError extends AlertmanagerError {
  constructor(message: string, cause?: unknown) {
    super("OVERRIDE_PARSE", message, { cause });
  }
}

export class SerializationError extends AlertmanagerError {
  constructor(cause: unknown) {
    super("SERIALIZATION", `failed to marshal alerts: ${describeCause(cause)}`, { cause });
  }
}

/** Connection refused, DNS failure, timeout: no HTTP response was received. */
export class TransportError extends AlertmanagerError {
  constructor(cause: unknown) {
    super("TRANSPORT", `failed to send request to Alertmanager: ${describeCause(cause)}`, { cause });
  }
}

/** Alertmanager answered with a status outside [200, 300). */
export class RemoteRejectionError extends AlertmanagerError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, cause?: unknown) {
    super("REMOTE_REJECTION", `Alertmanager returned status ${status}: ${body}`, { cause });
    this.status = status;
    this.body = body;
  }
}

export function isAlertmanagerError(err: unknown): err is AlertmanagerError {
  return err instanceof AlertmanagerError;
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    // fetch wraps the socket error ("fetch failed" → ECONNREFUSED ...)
    const inner = cause.cause instanceof Error ? `: ${cause.cause.message}` : "";
    return `${cause.message}${inner}`;
  }
  return String(cause);
}
