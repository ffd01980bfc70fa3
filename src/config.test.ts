import { describe, it, expect } from "@jest/globals";
import { DEFAULT_CONFIG, createConfig, loadConfigFromEnv } from "./config.js";

describe("createConfig", () => {
  it("should apply defaults", () => {
    expect(createConfig()).toEqual({
      baseUrl: "http://localhost:8000",
      timeoutSeconds: 20,
    });
  });

  it("should return a frozen object", () => {
    const config = createConfig({ timeoutSeconds: 5 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
  });

  it("should reject an unparseable base URL", () => {
    expect(() => createConfig({ baseUrl: "not a url" })).toThrow(
      "Invalid base URL: not a url",
    );
  });

  it("should reject non-http schemes", () => {
    expect(() => createConfig({ baseUrl: "ftp://lemonade.test" })).toThrow(
      "Base URL must use http or https: ftp://lemonade.test",
    );
  });

  it("should reject non-positive or non-numeric timeouts", () => {
    expect(() => createConfig({ timeoutSeconds: 0 })).toThrow(
      "Timeout must be a positive number of seconds.",
    );
    expect(() => createConfig({ timeoutSeconds: Number.NaN })).toThrow(
      "Timeout must be a positive number of seconds.",
    );
  });
});

describe("loadConfigFromEnv", () => {
  it("should read values from the environment", () => {
    expect(
      loadConfigFromEnv({
        LEMONADE_BASE_URL: "http://lemonade.test:9000",
        LEMONADE_TIMEOUT_SECONDS: "5",
      }),
    ).toEqual({ baseUrl: "http://lemonade.test:9000", timeoutSeconds: 5 });
  });

  it("should fall back to defaults for missing or empty values", () => {
    expect(loadConfigFromEnv({ LEMONADE_BASE_URL: "" })).toEqual(DEFAULT_CONFIG);
  });

  it("should reject a non-numeric timeout", () => {
    expect(() => loadConfigFromEnv({ LEMONADE_TIMEOUT_SECONDS: "soon" })).toThrow(
      "Timeout must be a positive number of seconds.",
    );
  });
});
