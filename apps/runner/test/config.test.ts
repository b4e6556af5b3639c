import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/index.js";
import { ConfigError } from "../src/errors.js";

describe("loadConfig", () => {
  it("falls back to defaults for unset keys", () => {
    expect(loadConfig({})).toEqual({
      apiUrl: "https://api.restful-api.dev/objects",
      storefrontUrl: "https://www.amazon.com/",
      storefrontBrand: "Amazon",
      headless: true,
      httpTimeoutMs: 10000,
      waitTimeoutMs: 5000,
      runTimeoutMs: 120000,
      concurrency: 1,
      reportDir: "./data/reports",
      viewport: { width: 1288, height: 711 },
    });
  });

  it("reads and coerces environment values", () => {
    const config = loadConfig({
      DAA_API_URL: "http://localhost:8080/objects",
      HEADLESS: "0",
      DAA_CONCURRENCY: "4",
      DAA_VIEWPORT: "1920x1080",
      CHROME_PATH: "/opt/chrome/chrome",
    });

    expect(config.apiUrl).toBe("http://localhost:8080/objects");
    expect(config.headless).toBe(false);
    expect(config.concurrency).toBe(4);
    expect(config.viewport).toEqual({ width: 1920, height: 1080 });
    expect(config.chromePath).toBe("/opt/chrome/chrome");
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ HEADLESS: "", DAA_REPORT_DIR: "" })).toMatchObject({
      headless: true,
      reportDir: "./data/reports",
    });
  });

  it("collects every invalid key into one ConfigError", () => {
    let caught: unknown;
    try {
      loadConfig({ DAA_CONCURRENCY: "0", DAA_VIEWPORT: "wide" });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.issues).toEqual([
      "concurrency: Number must be greater than or equal to 1",
      "viewport: expected <width>x<height>",
    ]);
    expect(caught.message).toBe(
      "Invalid configuration:\n  concurrency: Number must be greater than or equal to 1\n  viewport: expected <width>x<height>",
    );
  });

  it("rejects a malformed URL", () => {
    expect(() => loadConfig({ DAA_API_URL: "not a url" })).toThrow(ConfigError);
  });
});
