import { ConfigurationError } from "../errors.js";
import type { AlertProvider, EffectiveConfig, ProviderConfig } from "../types/config.js";

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_SEVERITY = "critical";

/**
 * Apply defaults and check the URL. Returns a new value; `cfg` is left untouched so stored
 * configuration never picks up defaults from a resolution.
 */
export function validateConfig(cfg: ProviderConfig): EffectiveConfig {
  if (!cfg.url) {
    throw new ConfigurationError("alertmanager URL not set");
  }
  return {
    ...cfg,
    url: cfg.url,
    timeoutMs: cfg.timeoutMs && cfg.timeoutMs > 0 ? cfg.timeoutMs : DEFAULT_TIMEOUT_MS,
    defaultSeverity: cfg.defaultSeverity || DEFAULT_SEVERITY,
  };
}

/** Key union of two maps into a fresh object; `override` wins. Empty overrides leave `base` as is. */
function mergeMaps(
  base: Record<string, string> | undefined,
  override: Record<string, string> | undefined
): Record<string, string> | undefined {
  if (!override || Object.keys(override).length === 0) {
    return base ? { ...base } : undefined;
  }
  return { ...base, ...override };
}

/**
 * Field-by-field override: a field of `override` wins only when present (non-empty string,
 * positive duration, non-empty map, defined client). `client` is replaced, never merged.
 */
export function mergeConfig(base: ProviderConfig, override: ProviderConfig): ProviderConfig {
  const merged: ProviderConfig = { ...base };
  if (override.client) merged.client = override.client;
  if (override.url) merged.url = override.url;
  if (override.timeoutMs && override.timeoutMs > 0) merged.timeoutMs = override.timeoutMs;
  if (override.defaultSeverity) merged.defaultSeverity = override.defaultSeverity;

  const extraLabels = mergeMaps(base.extraLabels, override.extraLabels);
  if (extraLabels) merged.extraLabels = extraLabels;
  const extraAnnotations = mergeMaps(base.extraAnnotations, override.extraAnnotations);
  if (extraAnnotations) merged.extraAnnotations = extraAnnotations;
  return merged;
}

/** Copy with private label/annotation maps, so nothing downstream can write into `cfg`'s maps. */
export function cloneConfig(cfg: ProviderConfig): ProviderConfig {
  const copy: ProviderConfig = { ...cfg };
  if (cfg.extraLabels) copy.extraLabels = { ...cfg.extraLabels };
  if (cfg.extraAnnotations) copy.extraAnnotations = { ...cfg.extraAnnotations };
  return copy;
}

export function validateProvider(provider: AlertProvider): EffectiveConfig {
  return validateConfig(provider.defaultConfig);
}
