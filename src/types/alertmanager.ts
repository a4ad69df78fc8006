/** One alert as built for Alertmanager; never mutated after construction */
export interface AlertmanagerAlert {
  labels: Record<string, string>;
  annotations: Record<string, string>;
  startsAt: Date;
  /** Unset while firing; the recovery instant when resolved */
  endsAt?: Date;
}

/** Alertmanager API v2 wire format (POST /api/v2/alerts takes an array of these) */
export interface WireAlert {
  labels: Record<string, string>;
  annotations: Record<string, string>;
  startsAt: string;
  endsAt?: string;
}

/** Fixed label values identifying alerts emitted by this notifier */
export const ALERT_NAME = "GatusEndpointDown";
export const ALERT_JOB = "gatus";

export const ALERTS_API_PATH = "/api/v2/alerts";
