import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({ env: "development", port: 5000, maxUploadBytes: 50 * 1024 * 1024 });
  });

  it("reads values from the environment", () => {
    expect(loadConfig({ NODE_ENV: "production", PORT: "8080", MAX_UPLOAD_MB: "2" })).toEqual({
      env: "production",
      port: 8080,
      maxUploadBytes: 2 * 1024 * 1024,
    });
  });

  it("rejects an invalid port", () => {
    expect(() => loadConfig({ PORT: "not-a-port" })).toThrow(/^Invalid configuration: Validation error: .*PORT/);
  });
});
