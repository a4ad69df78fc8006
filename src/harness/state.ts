import { z } from "zod";

export interface EndpointState {
  healthy: boolean;
  /** HTTP status GET /health/:endpoint answers with */
  status: number;
  message: string;
}

/** Body of POST /control/:endpoint; status and message follow `healthy` when omitted */
export const endpointStateUpdateSchema = z.object({
  healthy: z.boolean(),
  status: z.number().int().min(100).max(599).optional(),
  message: z.string().optional(),
});

export type EndpointStateUpdate = z.infer<typeof endpointStateUpdateSchema>;

export const SEEDED_ENDPOINTS = ["api", "database", "cache"] as const;

function healthyState(): EndpointState {
  return { healthy: true, status: 200, message: "OK" };
}

/** In-memory state of the controllable endpoints. One store per harness process. */
export class EndpointStateStore {
  private readonly states = new Map<string, EndpointState>();

  constructor(names: readonly string[] = SEEDED_ENDPOINTS) {
    for (const name of names) this.states.set(name, healthyState());
  }

  get(name: string): EndpointState | undefined {
    const state = this.states.get(name);
    return state ? { ...state } : undefined;
  }

  /** Create or replace an endpoint's state */
  set(name: string, update: EndpointStateUpdate): EndpointState {
    const state: EndpointState = {
      healthy: update.healthy,
      status: update.status ?? (update.healthy ? 200 : 503),
      message: update.message ?? (update.healthy ? "OK" : "Service unavailable"),
    };
    this.states.set(name, state);
    return { ...state };
  }

  names(): string[] {
    return [...this.states.keys()];
  }

  snapshot(): Record<string, EndpointState> {
    const out: Record<string, EndpointState> = {};
    for (const [name, state] of this.states) out[name] = { ...state };
    return out;
  }
}

/** Even minutes fail, odd minutes pass */
export function minuteBasedHealthy(now: Date): boolean {
  return now.getMinutes() % 2 === 1;
}

/** The first 20 seconds of every minute fail */
export function secondBasedHealthy(now: Date): boolean {
  return now.getSeconds() >= 20;
}
