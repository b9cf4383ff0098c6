import { describe, expect, it } from "vitest";

import { ConfigError, loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults when only the key is set", () => {
    expect(loadConfig({ GOOGLE_API_KEY: "test-secret" })).toEqual({
      googleApiKey: "test-secret",
      geminiModel: "gemini-2.0-flash",
      port: 8000,
    });
  });

  it("reads the model and port overrides", () => {
    const config = loadConfig({
      GOOGLE_API_KEY: "test-secret",
      GEMINI_MODEL: "gemini-1.5-pro",
      PORT: "3001",
    });

    expect(config.geminiModel).toBe("gemini-1.5-pro");
    expect(config.port).toBe(3001);
  });

  it("treats an empty model or port as unset", () => {
    const config = loadConfig({ GOOGLE_API_KEY: "test-secret", GEMINI_MODEL: "", PORT: "" });

    expect(config.geminiModel).toBe("gemini-2.0-flash");
    expect(config.port).toBe(8000);
  });

  it("returns a frozen object", () => {
    expect(Object.isFrozen(loadConfig({ GOOGLE_API_KEY: "test-secret" }))).toBe(true);
  });

  it.each([
    ["missing", {}],
    ["empty", { GOOGLE_API_KEY: "" }],
    ["blank", { GOOGLE_API_KEY: "   " }],
  ])("fails when the API key is %s", (_label, env) => {
    expect(() => loadConfig(env)).toThrow(ConfigError);
    expect(() => loadConfig(env)).toThrow(
      "Invalid configuration: GOOGLE_API_KEY is not set in environment variables"
    );
  });

  it("rejects a port that is not a number", () => {
    expect(() => loadConfig({ GOOGLE_API_KEY: "test-secret", PORT: "http" })).toThrow(
      ConfigError
    );
  });

  it("rejects a port out of range", () => {
    expect(() => loadConfig({ GOOGLE_API_KEY: "test-secret", PORT: "70000" })).toThrow(
      ConfigError
    );
  });
});
