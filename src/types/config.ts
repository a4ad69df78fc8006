import { z } from "zod";
import { parseDuration } from "./duration.js";

/** Transport settings handed to the HTTP client factory; replaced wholesale by overrides. */
export interface ClientConfig {
  /** Client-level request timeout in ms; the provider timeout takes precedence per request */
  timeoutMs?: number;
  /** Do not follow redirects returned by Alertmanager */
  ignoreRedirect?: boolean;
}

/**
 * Settings of one Alertmanager provider, or a fragment of them when used as an override.
 * Unset (or empty / zero) fields are "absent" for merging.
 */
export interface ProviderConfig {
  /** Alertmanager base URL or full /api/v2/alerts URL */
  url?: string;
  timeoutMs?: number;
  defaultSeverity?: string;
  extraLabels?: Record<string, string>;
  extraAnnotations?: Record<string, string>;
  client?: ClientConfig;
}

/** Configuration after validation: defaults applied, URL guaranteed. */
export interface EffectiveConfig extends ProviderConfig {
  url: string;
  timeoutMs: number;
  defaultSeverity: string;
}

/** Group-scoped exception to the default configuration */
export interface Override extends ProviderConfig {
  group: string;
}

/** Alert definition fields the provider reads (default-alert and per-endpoint alerts share the shape) */
export interface AlertDefinition {
  enabled?: boolean;
  description?: string;
  sendOnResolved?: boolean;
  /** Raw alert-level provider override: an object or YAML/JSON text in the provider config schema */
  providerOverride?: Record<string, unknown> | string;
}

export interface AlertProvider {
  defaultConfig: ProviderConfig;
  defaultAlert?: AlertDefinition;
  /** First override whose group matches wins */
  overrides: Override[];
}

const durationSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const ms = parseDuration(value);
  if (ms === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid duration "${value}"` });
    return z.NEVER;
  }
  return ms;
});

const stringMapSchema = z.record(z.string());

export const clientConfigSchema = z
  .object({
    timeout: durationSchema.optional(),
    "ignore-redirect": z.boolean().optional(),
  })
  .strict()
  .transform((raw): ClientConfig => {
    const out: ClientConfig = {};
    if (raw.timeout !== undefined) out.timeoutMs = raw.timeout;
    if (raw["ignore-redirect"] !== undefined) out.ignoreRedirect = raw["ignore-redirect"];
    return out;
  });

/** Keys shared by the provider block, each override, and alert-level override blobs */
const configShape = {
  url: z.string().optional(),
  timeout: durationSchema.optional(),
  "default-severity": z.string().optional(),
  "extra-labels": stringMapSchema.nullish(),
  "extra-annotations": stringMapSchema.nullish(),
  client: clientConfigSchema.nullish(),
};

type RawConfig = z.output<z.ZodObject<typeof configShape>>;

function toProviderConfig(raw: RawConfig): ProviderConfig {
  const out: ProviderConfig = {};
  if (raw.url !== undefined) out.url = raw.url;
  if (raw.timeout !== undefined) out.timeoutMs = raw.timeout;
  if (raw["default-severity"] !== undefined) out.defaultSeverity = raw["default-severity"];
  if (raw["extra-labels"] != null) out.extraLabels = raw["extra-labels"];
  if (raw["extra-annotations"] != null) out.extraAnnotations = raw["extra-annotations"];
  if (raw.client != null) out.client = raw.client;
  return out;
}

/** A provider config fragment (kebab-case keys, as written in YAML). Unknown keys are rejected. */
export const providerConfigSchema = z.object(configShape).strict().transform(toProviderConfig);

export const overrideSchema = z
  .object({ group: z.string(), ...configShape })
  .strict()
  .transform(({ group, ...rest }): Override => ({ group, ...toProviderConfig(rest) }));

export const alertDefinitionSchema = z
  .object({
    enabled: z.boolean().optional(),
    description: z.string().optional(),
    "send-on-resolved": z.boolean().optional(),
    "provider-override": z.union([z.record(z.unknown()), z.string()]).optional(),
  })
  .transform((raw): AlertDefinition => {
    const out: AlertDefinition = {};
    if (raw.enabled !== undefined) out.enabled = raw.enabled;
    if (raw.description !== undefined) out.description = raw.description;
    if (raw["send-on-resolved"] !== undefined) out.sendOnResolved = raw["send-on-resolved"];
    if (raw["provider-override"] !== undefined) out.providerOverride = raw["provider-override"];
    return out;
  });

/** The provider block of the configuration file: default config inline, plus default-alert and overrides */
export const alertProviderSchema = z
  .object({
    ...configShape,
    "default-alert": alertDefinitionSchema.optional(),
    overrides: z.array(overrideSchema).nullish(),
  })
  .strict()
  .transform(({ "default-alert": defaultAlert, overrides, ...rest }): AlertProvider => {
    const provider: AlertProvider = {
      defaultConfig: toProviderConfig(rest),
      overrides: overrides ?? [],
    };
    if (defaultAlert !== undefined) provider.defaultAlert = defaultAlert;
    return provider;
  });

/** One line per issue, prefixed with the YAML key path */
export function formatConfigIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
}
