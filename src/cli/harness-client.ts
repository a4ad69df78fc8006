import { z } from "zod";
import type { EndpointState, EndpointStateUpdate } from "../harness/state.js";

const endpointStateSchema = z.object({
  healthy: z.boolean(),
  status: z.number(),
  message: z.string(),
});

const endpointStatusSchema = endpointStateSchema.extend({ endpoint: z.string() });

const timeStatusSchema = z.object({
  healthy: z.boolean(),
  message: z.string(),
  time: z.string(),
  minute: z.number().optional(),
  second: z.number().optional(),
});

export type EndpointStatus = z.infer<typeof endpointStatusSchema>;
export type TimeStatus = z.infer<typeof timeStatusSchema>;

export class HarnessRequestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HarnessRequestError";
  }
}

/** HTTP client for the test harness control API */
export class HarnessClient {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  private async request<T>(path: string, schema: z.ZodType<T>, init?: RequestInit, acceptStatus?: (status: number) => boolean): Promise<T> {
    const url = `${this.baseUrl.replace(/\/$/, "")}${path}`;
    let res: Response;
    try {
      res = await this.fetchImpl(url, init);
    } catch (err) {
      throw new HarnessRequestError(`Could not connect to test harness at ${this.baseUrl}`, { cause: err });
    }
    const ok = acceptStatus ? acceptStatus(res.status) : res.ok;
    const body: unknown = await res.json().catch((err: unknown) => {
      throw new HarnessRequestError(`Invalid JSON from ${url} (status ${res.status})`, { cause: err });
    });
    if (!ok) {
      throw new HarnessRequestError(`${url} returned status ${res.status}`);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new HarnessRequestError(`Unexpected response from ${url}`, { cause: parsed.error });
    }
    return parsed.data;
  }

  list(): Promise<Record<string, EndpointState>> {
    return this.request("/control/", z.record(endpointStateSchema));
  }

  /** A failing endpoint answers with its failure status; only 404 means it does not exist */
  status(endpoint: string): Promise<EndpointStatus> {
    return this.request(`/health/${encodeURIComponent(endpoint)}`, endpointStatusSchema, undefined, (s) => s !== 404);
  }

  setState(endpoint: string, update: EndpointStateUpdate): Promise<EndpointStatus> {
    return this.request(`/control/${encodeURIComponent(endpoint)}`, endpointStatusSchema, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(update),
    });
  }

  timeBased(): Promise<TimeStatus> {
    return this.request("/time-based", timeStatusSchema, undefined, (s) => s === 200 || s === 503);
  }

  secondBased(): Promise<TimeStatus> {
    return this.request("/second-based", timeStatusSchema, undefined, (s) => s === 200 || s === 503);
  }
}
