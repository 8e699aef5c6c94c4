import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_QUERY_INSTRUCTIONS, getAppConfig } from "./config";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("getAppConfig", () => {
  it("uses defaults when nothing is set", () => {
    expect(getAppConfig({})).toEqual({
      openaiBaseUrl: "https://api.openai.com/v1",
      defaultModel: "gpt-4.1-mini",
      requestTimeoutMs: 60_000,
      polling: { intervalMs: 1_000, timeoutMs: 90_000, backoffFactor: 1, maxIntervalMs: 5_000 },
      maxUploadMb: 25,
      queryInstructions: DEFAULT_QUERY_INSTRUCTIONS,
    });
  });

  it("reads overrides from the environment", () => {
    const config = getAppConfig({
      VITE_OPENAI_BASE_URL: "https://proxy.test/v1/",
      VITE_DEFAULT_MODEL: " gpt-4o ",
      VITE_INDEXING_POLL_INTERVAL_MS: "500",
      VITE_INDEXING_TIMEOUT_MS: "120000",
      VITE_INDEXING_BACKOFF_FACTOR: "1.5",
      VITE_INDEXING_MAX_INTERVAL_MS: "4000",
      VITE_MAX_UPLOAD_MB: "10",
    });

    expect(config.openaiBaseUrl).toBe("https://proxy.test/v1");
    expect(config.defaultModel).toBe("gpt-4o");
    expect(config.polling).toEqual({ intervalMs: 500, timeoutMs: 120_000, backoffFactor: 1.5, maxIntervalMs: 4_000 });
    expect(config.maxUploadMb).toBe(10);
  });

  it("falls back and warns on invalid values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    const config = getAppConfig({ VITE_INDEXING_TIMEOUT_MS: "soon", VITE_OPENAI_BASE_URL: "not a url" });

    expect(config.polling.timeoutMs).toBe(90_000);
    expect(config.openaiBaseUrl).toBe("https://api.openai.com/v1");
    expect(warn.mock.calls.map(([line]) => line)).toEqual([
      '{"level":"warn","name":"config_invalid","reason":"VITE_OPENAI_BASE_URL"}',
      '{"level":"warn","name":"config_invalid","reason":"VITE_INDEXING_TIMEOUT_MS"}',
    ]);
  });

  it("never lets the poll cap drop below the interval", () => {
    const config = getAppConfig({ VITE_INDEXING_POLL_INTERVAL_MS: "3000", VITE_INDEXING_MAX_INTERVAL_MS: "1000" });

    expect(config.polling.maxIntervalMs).toBe(3_000);
  });
});
