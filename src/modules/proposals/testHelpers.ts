// Builders shared by the proposal module tests.

import type { MatchConfig, PipelineConfig } from "../../config/pipeline";
import { isRetryableError } from "../../lib/errors";
import type { RetryPolicy } from "../../lib/retry";
import type {
  Candidate,
  MatchedResult,
  RequestItem,
  RequiredAttribute,
  UnmatchedResult,
} from "./types";

export const testRetry: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 0,
  maxDelayMs: 0,
  timeoutMs: 1000,
  isRetryable: isRetryableError,
};

export function testMatchConfig(overrides: Partial<MatchConfig> = {}): MatchConfig {
  return {
    topK: 10,
    acceptanceThreshold: 50,
    numericTolerancePercent: 10,
    concurrency: 4,
    rerank: { enabled: false, topN: 3 },
    ...overrides,
  };
}

export function testConfig(match: Partial<MatchConfig> = {}): PipelineConfig {
  return { match: testMatchConfig(match), retry: testRetry, currency: "INR" };
}

export function makeItem(
  id: string,
  attributes: Record<string, RequiredAttribute>,
  overrides: Partial<RequestItem> = {}
): RequestItem {
  return {
    id,
    description: `Item ${id}`,
    quantity: 1,
    unit: "pcs",
    attributes,
    ...overrides,
  };
}

export function makeCandidate(
  id: string,
  attributes: Candidate["attributes"],
  unitPrice: number
): Candidate {
  return { id, name: `Product ${id}`, attributes, unitPrice };
}

export function matched(itemId: string, candidateId: string, score = 100): MatchedResult {
  return {
    itemId,
    status: "Matched",
    chosenCandidateId: candidateId,
    ranked: [],
    finalScore: score,
    breakdown: [],
    label: "Exact Match",
    comparison: [],
    annotations: [],
  };
}

export function unmatchedResult(itemId: string): UnmatchedResult {
  return {
    itemId,
    status: "Unmatched",
    chosenCandidateId: null,
    ranked: [],
    finalScore: 0,
    breakdown: [],
    label: "No Match",
    comparison: [],
    annotations: [],
    reason: "NO_CANDIDATES",
  };
}

/** Silences the pipeline's console logging for the duration of a test file. */
export function silenceConsole() {
  beforeEach(() => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    jest.spyOn(console, "log").mockImplementation(() => undefined);
  });
  afterEach(() => {
    jest.restoreAllMocks();
  });
}
