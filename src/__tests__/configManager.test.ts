import { describe, expect, it } from "vitest";
import { loadConfig } from "../config/configManager";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      concurrency: 10,
      requestTimeoutMs: 60000,
      maxConnections: 100,
      schema: { attributesField: "attributes", traitFields: ["trait_type", "trait"], valueField: "value" },
      auth: undefined,
    });
  });

  it("should read overrides", () => {
    const config = loadConfig({
      PORT: "8080",
      CONCURRENCY: "20",
      REQUEST_TIMEOUT_MS: "5000",
      ATTRIBUTES_FIELD: "traits",
      TRAIT_FIELD: "type, name",
      VALUE_FIELD: "val",
      AUTH_USER: "test-user",
      AUTH_PASSWORD: "test-secret",
    });

    expect(config.port).toBe(8080);
    expect(config.concurrency).toBe(20);
    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.schema).toEqual({ attributesField: "traits", traitFields: ["type", "name"], valueField: "val" });
    expect(config.auth).toEqual({ user: "test-user", password: "test-secret" });
  });

  it("should ignore half-configured auth", () => {
    expect(loadConfig({ AUTH_USER: "test-user" }).auth).toBeUndefined();
  });

  it.each(["0", "-3", "abc", "1.5"])("should reject CONCURRENCY=%s", (value) => {
    expect(() => loadConfig({ CONCURRENCY: value })).toThrow(ConfigError);
  });
});
