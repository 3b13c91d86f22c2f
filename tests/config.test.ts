import { describe, it, expect, afterEach } from "vitest";
import config from "../src/config";
import { DEFAULT_CONFIG } from "../src/engine/index";

describe("config", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("reads the component cap from the environment", () => {
    process.env.CSP_MAX_COMPONENT_SIZE = "10";
    expect(config.maxComponentSize).toBe(10);
  });

  it("falls back to the default cap on bad input", () => {
    process.env.CSP_MAX_COMPONENT_SIZE = "lots";
    expect(config.maxComponentSize).toBe(DEFAULT_CONFIG.maxComponentSize);
    delete process.env.CSP_MAX_COMPONENT_SIZE;
    expect(config.maxComponentSize).toBe(14);
  });

  it("accepts known log levels only", () => {
    process.env.LOG_LEVEL = "debug";
    expect(config.logLevel).toBe("debug");
    process.env.LOG_LEVEL = "chatty";
    expect(config.logLevel).toBe("info");
  });
});
