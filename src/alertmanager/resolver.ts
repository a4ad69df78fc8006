import { parse as parseYaml } from "yaml";
import { OverrideParseError } from "../errors.js";
import {
  formatConfigIssues,
  providerConfigSchema,
  type AlertDefinition,
  type AlertProvider,
  type EffectiveConfig,
  type ProviderConfig,
} from "../types/config.js";
import { cloneConfig, mergeConfig, validateConfig } from "./config.js";

function isNonEmptyOverride(raw: Record<string, unknown> | string): boolean {
  if (typeof raw === "string") return raw.trim().length > 0;
  return Object.keys(raw).length > 0;
}

/** Parse an alert-level override blob (object, or YAML/JSON text) into a config fragment. */
export function parseProviderOverride(raw: Record<string, unknown> | string): ProviderConfig {
  let data: unknown = raw;
  if (typeof raw === "string") {
    try {
      data = parseYaml(raw);
    } catch (err) {
      throw new OverrideParseError(
        `provider override is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
        err
      );
    }
  }
  const result = providerConfigSchema.safeParse(data);
  if (!result.success) {
    throw new OverrideParseError(`invalid provider override: ${formatConfigIssues(result.error)}`, result.error);
  }
  return result.data;
}

/**
 * Effective configuration for one delivery: defaults, then the first override for `group`,
 * then the alert's own provider override, then validation. Reads the provider, never writes it.
 */
export function getConfig(
  provider: AlertProvider,
  group: string,
  alert?: AlertDefinition
): EffectiveConfig {
  let cfg = cloneConfig(provider.defaultConfig);

  const groupOverride = provider.overrides.find((o) => o.group === group);
  if (groupOverride) {
    cfg = mergeConfig(cfg, groupOverride);
  }

  const raw = alert?.providerOverride;
  if (raw !== undefined && isNonEmptyOverride(raw)) {
    cfg = mergeConfig(cfg, parseProviderOverride(raw));
  }

  return validateConfig(cfg);
}

/** Throws when the alert's provider override (or the group override under it) does not resolve. */
export function validateOverrides(provider: AlertProvider, group: string, alert?: AlertDefinition): void {
  getConfig(provider, group, alert);
}

export function getDefaultAlert(provider: AlertProvider): AlertDefinition | undefined {
  return provider.defaultAlert;
}

/** Fill the fields an alert leaves unset from the provider's default-alert. */
export function withDefaultAlert(
  alert: AlertDefinition | undefined,
  defaults: AlertDefinition | undefined
): AlertDefinition {
  const merged: AlertDefinition = { ...defaults };
  if (alert?.enabled !== undefined) merged.enabled = alert.enabled;
  if (alert?.description !== undefined) merged.description = alert.description;
  if (alert?.sendOnResolved !== undefined) merged.sendOnResolved = alert.sendOnResolved;
  if (alert?.providerOverride !== undefined) merged.providerOverride = alert.providerOverride;
  return merged;
}
