import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { FastifyBaseLogger } from "fastify";
import { alertProviderSchema, formatConfigIssues, type AlertProvider } from "../types/config.js";
import { validateProvider } from "../alertmanager/config.js";

/** First path that exists wins; else the cwd-relative one. */
const DEFAULT_PATHS = ["/config/alertmanager.yaml"];

export type ProviderConfigResult = { ok: true; provider: AlertProvider } | { ok: false; error: string };

/**
 * Config file path: ALERTMANAGER_CONFIG_PATH env, else config/alertmanager.yaml relative to cwd,
 * else /config/alertmanager.yaml.
 */
export function getProviderConfigPath(path?: string): string {
  if (path) return resolve(path);
  if (process.env.ALERTMANAGER_CONFIG_PATH) return resolve(process.env.ALERTMANAGER_CONFIG_PATH);
  const cwdPath = resolve(process.cwd(), "config", "alertmanager.yaml");
  if (existsSync(cwdPath)) return cwdPath;
  for (const p of DEFAULT_PATHS) if (existsSync(p)) return p;
  return cwdPath;
}

/** Validate a parsed provider block (YAML keys) and check the default config resolves. */
export function parseProviderConfig(data: unknown): ProviderConfigResult {
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    return { ok: false, error: "Config must be a mapping of provider settings" };
  }
  const parsed = alertProviderSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: formatConfigIssues(parsed.error) };
  }
  try {
    validateProvider(parsed.data);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
  return { ok: true, provider: parsed.data };
}

/** Read and validate the provider config file. YAML is a superset of JSON, so both are accepted. */
export function loadProviderConfig(path?: string): ProviderConfigResult {
  const configPath = getProviderConfigPath(path);
  if (!existsSync(configPath)) return { ok: false, error: `Config file not found: ${configPath}` };
  let data: unknown;
  try {
    data = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
  return parseProviderConfig(data);
}

let cachedProvider: AlertProvider | null = null;

/** Cached provider; loads the file on first use. Null when the file is missing or invalid. */
export function getProvider(path?: string): AlertProvider | null {
  if (cachedProvider === null) {
    const result = loadProviderConfig(path);
    if (result.ok) cachedProvider = result.provider;
  }
  return cachedProvider;
}

/** Re-read the file; the cache is replaced only when the new file is valid. */
export function reloadProviderSafe(path?: string): ProviderConfigResult {
  const result = loadProviderConfig(path);
  if (result.ok) cachedProvider = result.provider;
  return result;
}

export function clearProviderCache(): void {
  cachedProvider = null;
}

export function setProviderCache(provider: AlertProvider): void {
  cachedProvider = provider;
}

export function bootstrapProviderConfig(log: FastifyBaseLogger): void {
  const path = getProviderConfigPath();
  const result = reloadProviderSafe(path);
  if (!result.ok) {
    log.warn({ component: "config", event: "bootstrap_failed", path, error: result.error }, "config_bootstrap_failed");
    return;
  }
  const overrides = result.provider.overrides.length;
  log.info({ component: "config", event: "bootstrap", source: "file", path, overrides }, "config_bootstrapped_from_file");
}
