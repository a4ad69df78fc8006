import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { validateEnv } from "../src/env.js";

const KEYS = ["PORT", "HARNESS_PORT", "ALERTMANAGER_CONFIG_PATH", "HARNESS_URL", "LOG_LEVEL"] as const;
type EnvKey = (typeof KEYS)[number];

let saved: Partial<Record<EnvKey, string | undefined>> = {};

beforeEach(() => {
  saved = {};
  for (const k of KEYS) {
    saved[k] = process.env[k];
    delete process.env[k];
  }
});

afterEach(() => {
  for (const k of KEYS) {
    if (saved[k] === undefined) delete process.env[k];
    else process.env[k] = saved[k];
  }
});

describe("validateEnv", () => {
  it("passes with nothing set", () => {
    expect(() => validateEnv()).not.toThrow();
  });

  it.each(["abc", "0", "65536", "80.5"])("rejects PORT=%s", (value) => {
    process.env.PORT = value;
    expect(() => validateEnv()).toThrow(`PORT must be an integer between 1 and 65535 (got "${value}")`);
  });

  it("rejects an invalid HARNESS_PORT", () => {
    process.env.HARNESS_PORT = "-1";
    expect(() => validateEnv()).toThrow(/HARNESS_PORT/);
  });

  it("passes for valid ports", () => {
    process.env.PORT = "4000";
    process.env.HARNESS_PORT = "8082";
    expect(() => validateEnv()).not.toThrow();
  });

  it("accepts yaml, yml and json config paths", () => {
    for (const path of ["/config/alertmanager.yaml", "am.yml", "am.JSON"]) {
      process.env.ALERTMANAGER_CONFIG_PATH = path;
      expect(() => validateEnv()).not.toThrow();
    }
  });

  it("rejects a config path with another extension", () => {
    process.env.ALERTMANAGER_CONFIG_PATH = "/config/alertmanager.toml";
    expect(() => validateEnv()).toThrow(/ALERTMANAGER_CONFIG_PATH/);
  });

  it("rejects a HARNESS_URL without an http scheme", () => {
    process.env.HARNESS_URL = "localhost:8082";
    expect(() => validateEnv()).toThrow("HARNESS_URL must start with http:// or https://");
  });

  it("throws for invalid LOG_LEVEL", () => {
    process.env.LOG_LEVEL = "verbose";
    expect(() => validateEnv()).toThrow(/LOG_LEVEL/);
  });

  it("passes for each valid LOG_LEVEL", () => {
    for (const level of ["fatal", "error", "warn", "info", "debug", "trace", "silent"]) {
      process.env.LOG_LEVEL = level;
      expect(() => validateEnv()).not.toThrow();
    }
  });

  it("collects multiple errors into one message", () => {
    process.env.PORT = "nope";
    process.env.HARNESS_URL = "ftp://harness";
    let message = "";
    try {
      validateEnv();
    } catch (e) {
      message = e instanceof Error ? e.message : String(e);
    }
    expect(message.split("\n")).toEqual([
      "Environment validation failed:",
      '  - PORT must be an integer between 1 and 65535 (got "nope")',
      "  - HARNESS_URL must start with http:// or https://",
    ]);
  });
});
