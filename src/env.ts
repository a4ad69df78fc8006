const VALID_LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

function isValidPort(raw: string): boolean {
  const port = Number(raw);
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Validate required and format-sensitive environment variables at startup.
 * Throws with a descriptive message listing all failures if any are invalid.
 */
export function validateEnv(): void {
  const errors: string[] = [];

  for (const key of ["PORT", "HARNESS_PORT"] as const) {
    const raw = process.env[key];
    if (raw !== undefined && !isValidPort(raw)) {
      errors.push(`${key} must be an integer between 1 and 65535 (got "${raw}")`);
    }
  }

  const configPath = process.env.ALERTMANAGER_CONFIG_PATH;
  if (configPath && !/\.(ya?ml|json)$/i.test(configPath)) {
    errors.push("ALERTMANAGER_CONFIG_PATH must point to a .yaml, .yml or .json file");
  }

  if (process.env.HARNESS_URL && !/^https?:\/\//.test(process.env.HARNESS_URL)) {
    errors.push("HARNESS_URL must start with http:// or https://");
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && !VALID_LOG_LEVELS.includes(logLevel as (typeof VALID_LOG_LEVELS)[number])) {
    errors.push(`LOG_LEVEL must be one of: ${VALID_LOG_LEVELS.join(", ")} (got "${logLevel}")`);
  }

  if (errors.length > 0) {
    throw new Error(`Environment validation failed:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }
}
