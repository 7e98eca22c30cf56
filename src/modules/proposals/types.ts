// src/modules/proposals/types.ts

import type { PipelineErrorCode } from "../../lib/errors";

export type ToleranceKind = "exact" | "numeric-percent" | "none";

export type AttributeValue = string | number;

export type RequiredAttribute = {
  value: AttributeValue;
  tolerance: ToleranceKind;
  /** Overrides the configured numeric band for "numeric-percent". */
  tolerancePercent?: number;
};

export type RequestItem = {
  id: string;
  description: string;
  quantity: number;
  unit: string;
  attributes: Record<string, RequiredAttribute>;
};

export type TestRequirement = {
  name: string;
  description?: string;
  standard?: string;
  price: number;
};

export type Rfp = {
  id: string;
  title: string;
  buyer?: string | null;
  summary?: string | null;
  items: RequestItem[];
  testRequirements: TestRequirement[];
};

export type Candidate = {
  id: string;
  name: string;
  category?: string;
  attributes: Record<string, AttributeValue>;
  unitPrice: number;
};

// ---------------------------------------------------------------------------
// Spec matching

export type ScoreRule =
  | "exact"
  | "numeric-tolerance"
  | "text-overlap"
  | "missing"
  | "none";

export type AttributeScore = {
  attribute: string;
  requiredValue: string;
  candidateValue: string | null;
  score: number;
  rule: ScoreRule;
};

export type MatchLabel =
  | "Exact Match"
  | "Good Match"
  | "Partial Match"
  | "Weak Match"
  | "No Match";

export type RankedCandidate = {
  candidateId: string;
  score: number;
  similarity: number;
  unitPrice: number;
};

/** One row per required attribute: values of the top three ranked candidates. */
export type SpecComparisonRow = {
  attribute: string;
  requiredValue: string;
  candidateValues: [string, string, string];
};

export type MatchAnnotation = "UPSTREAM_UNAVAILABLE" | "RERANK_DEGRADED";

export type UnmatchedReason =
  | "NO_CANDIDATES"
  | "BELOW_THRESHOLD"
  | "UPSTREAM_UNAVAILABLE";

type MatchResultBase = {
  itemId: string;
  ranked: RankedCandidate[];
  finalScore: number;
  breakdown: AttributeScore[];
  label: MatchLabel;
  comparison: SpecComparisonRow[];
  annotations: MatchAnnotation[];
};

export type MatchedResult = MatchResultBase & {
  status: "Matched";
  chosenCandidateId: string;
  rerankedIds?: string[];
};

export type UnmatchedResult = MatchResultBase & {
  status: "Unmatched";
  chosenCandidateId: null;
  reason: UnmatchedReason;
  error?: string;
};

export type MatchResult = MatchedResult | UnmatchedResult;

// ---------------------------------------------------------------------------
// Pricing

export type PricingLine = {
  itemId: string;
  candidateId: string;
  quantity: number;
  unit: string;
  unitPrice: number;
  materialCost: number;
  allocatedTestCost: number;
  totalCost: number;
};

export type ProposalTotals = {
  currency: string;
  totalMaterialCost: number;
  testCostPool: number;
  allocatedTestCost: number;
  /** Pool that could not be spread because no matched item has material cost. */
  unallocatedTestCost: number;
  grandTotal: number;
};

export type PricingOutput = {
  lines: PricingLine[];
  totals: ProposalTotals;
};

// ---------------------------------------------------------------------------
// Narrative

export type NarrativeRequest = {
  rfpId: string;
  title: string;
  buyer: string | null;
  matchedItemCount: number;
  unmatchedItemCount: number;
  totalCost: number;
  currency: string;
  topMatches: Array<{
    itemId: string;
    candidateId: string;
    candidateName: string;
    score: number;
  }>;
};

export type NarrativeOutcome =
  | { kind: "success"; narrative: string }
  | { kind: "degraded"; narrative: null; reason: string };

// ---------------------------------------------------------------------------
// Run

export type RunState =
  | "Loaded"
  | "Matched"
  | "Priced"
  | "Synthesized"
  | "Complete"
  | "Failed";

export type RunStage = "load" | "match" | "price" | "synthesize" | "store";

export type StageFailure = {
  stage: RunStage;
  code: PipelineErrorCode;
  message: string;
  itemId?: string;
};

export type ProposalOutcome = "OK" | "PARTIAL_FAILURE";

export type ProposalResult = {
  rfpId: string;
  runId: string;
  state: RunState;
  outcome: ProposalOutcome;
  degraded: boolean;
  matches: MatchResult[];
  pricing: PricingLine[];
  totals: ProposalTotals;
  narrative: string | null;
  failures: StageFailure[];
  startedAt: string;
  finishedAt: string | null;
};

export type ProcessRfpResponse =
  | { ok: true; code: ProposalOutcome; result: ProposalResult }
  | {
      ok: false;
      code: PipelineErrorCode;
      error: string;
      issues?: string[];
      result?: ProposalResult;
    };

// ---------------------------------------------------------------------------
// External collaborators

export type VectorHit = {
  candidateId: string;
  similarity: number;
};

export interface EmbeddingClient {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface VectorSearchClient {
  query(vector: number[], topK: number, signal?: AbortSignal): Promise<VectorHit[]>;
}

export interface CatalogClient {
  getCandidate(id: string): Candidate | undefined;
}

/** Hands out a catalog that stays fixed for the lifetime of one run. */
export interface CatalogSource {
  snapshot(): CatalogClient;
}

export type LlmPrompt = {
  system: string;
  user: string;
  temperature?: number;
};

export interface LanguageModelClient {
  complete(prompt: LlmPrompt, signal?: AbortSignal): Promise<string>;
}

export interface ProposalRepository {
  /** Raw RFP record, validated by the caller. `null` when it does not exist. */
  loadRfp(rfpId: string, signal?: AbortSignal): Promise<unknown | null>;
  store(result: ProposalResult, signal?: AbortSignal): Promise<void>;
}

export type RunProgress = {
  state: RunState;
  progress: number;
  message: string;
  error?: string | null;
};

export interface RunProgressSink {
  report(runId: string, rfpId: string, progress: RunProgress): Promise<void>;
}
