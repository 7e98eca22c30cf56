import { ValidationError } from "../lib/errors";
import { loadPipelineConfig } from "./pipeline";

describe("loadPipelineConfig", () => {
  it("falls back to defaults", () => {
    const config = loadPipelineConfig({});

    expect(config.match).toEqual({
      topK: 10,
      acceptanceThreshold: 50,
      numericTolerancePercent: 10,
      concurrency: 4,
      rerank: { enabled: false, topN: 3 },
    });
    expect(config.retry).toMatchObject({
      maxAttempts: 3,
      baseDelayMs: 250,
      maxDelayMs: 4000,
      timeoutMs: 15000,
    });
    expect(config.currency).toBe("INR");
  });

  it("reads overrides and ignores blank values", () => {
    const config = loadPipelineConfig({
      MATCH_TOP_K: "5",
      MATCH_ACCEPTANCE_THRESHOLD: "70",
      RERANK_ENABLED: "true",
      RERANK_TOP_N: "",
      CURRENCY: "USD",
    });

    expect(config.match).toMatchObject({
      topK: 5,
      acceptanceThreshold: 70,
      rerank: { enabled: true, topN: 3 },
    });
    expect(config.currency).toBe("USD");
  });

  it("never lets the delay cap fall under the base delay", () => {
    const config = loadPipelineConfig({
      RETRY_BASE_DELAY_MS: "500",
      RETRY_MAX_DELAY_MS: "100",
    });
    expect(config.retry.maxDelayMs).toBe(500);
  });

  it("rejects invalid values", () => {
    expect(() => loadPipelineConfig({ MATCH_CONCURRENCY: "0" })).toThrow(ValidationError);
    expect(() => loadPipelineConfig({ RERANK_ENABLED: "maybe" })).toThrow(
      "Invalid pipeline configuration"
    );
  });
});
