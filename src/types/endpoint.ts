import { z } from "zod";
import { alertDefinitionSchema } from "./config.js";

/** The monitored endpoint, as known to the health-check scheduler */
export interface Endpoint {
  name: string;
  url: string;
  /** Routing group; selects a provider override and becomes the `group` label */
  group?: string;
}

/** Outcome of the latest health check */
export interface CheckResult {
  success: boolean;
  errors: string[];
}

/** Body of POST /events: one endpoint changed health state */
export const endpointEventSchema = z.object({
  endpoint: z.object({
    name: z.string().min(1),
    url: z.string().min(1),
    group: z.string().optional(),
  }),
  alert: alertDefinitionSchema.optional(),
  result: z.object({
    success: z.boolean(),
    errors: z.array(z.string()).optional().default([]),
  }),
  /** true when the endpoint recovered (alert resolved), false when it started failing */
  resolved: z.boolean(),
});

export type EndpointEvent = z.infer<typeof endpointEventSchema>;
