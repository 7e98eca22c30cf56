import { ATTRIBUTE_SYNONYMS } from "../../../config/attributeSynonyms";
import type {
  AttributeScore,
  AttributeValue,
  Candidate,
  MatchLabel,
  RequestItem,
  RequiredAttribute,
} from "../types";

export const SCORE_EXACT = 100;
export const SCORE_NUMERIC_TOLERANCE = 80;
export const SCORE_SUBSTRING = 60;
export const SCORE_TOKEN_OVERLAP_FLOOR = 50;

const FLOAT_EPSILON = 1e-9;

export function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function clampScore(n: number) {
  return Math.min(Math.max(n, 0), 100);
}

export function normalizeName(name: string) {
  return name
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

export function normalizeValue(value: AttributeValue) {
  return String(value).toLowerCase().trim().replace(/\s+/g, " ");
}

type Quantity = { value: number; unit: string };

/** "11kV" -> { value: 11, unit: "kv" }. First number wins. */
export function parseQuantity(text: string): Quantity | null {
  const m = /-?\d+(?:\.\d+)?/.exec(text);
  if (!m) return null;

  const rest = text.slice(0, m.index) + text.slice(m.index + m[0].length);
  return { value: Number(m[0]), unit: rest.replace(/[^a-z]/g, "") };
}

function unitsCompatible(a: Quantity, b: Quantity) {
  return a.unit === b.unit || a.unit === "" || b.unit === "";
}

/**
 * Finds the candidate's value for a required attribute: by normalised name
 * first, then through the synonym groups.
 */
export function findCandidateValue(
  attribute: string,
  candidate: Candidate
): AttributeValue | undefined {
  const target = normalizeName(attribute);
  const entries = Object.entries(candidate.attributes);

  const direct = entries.find(([name]) => normalizeName(name) === target);
  if (direct) return direct[1];

  for (const [canonical, group] of Object.entries(ATTRIBUTE_SYNONYMS)) {
    if (target !== canonical && !group.includes(target)) continue;

    const hit = entries.find(([name]) => {
      const n = normalizeName(name);
      return n === canonical || group.includes(n);
    });
    if (hit) return hit[1];
  }

  return undefined;
}

/** 60 for containment, 50-60 graded by shared-token fraction, else 0. */
export function textOverlapScore(required: string, offered: string) {
  if (required.includes(offered) || offered.includes(required)) {
    return SCORE_SUBSTRING;
  }

  const r = new Set(required.split(" ").filter(Boolean));
  const c = new Set(offered.split(" ").filter(Boolean));
  let shared = 0;
  for (const token of r) {
    if (c.has(token)) shared++;
  }
  if (shared === 0) return 0;

  const fraction = shared / Math.max(r.size, c.size);
  return round2(
    SCORE_TOKEN_OVERLAP_FLOOR +
      (SCORE_SUBSTRING - SCORE_TOKEN_OVERLAP_FLOOR) * fraction
  );
}

export function scoreAttribute(
  attribute: string,
  required: RequiredAttribute,
  candidateValue: AttributeValue | undefined,
  defaultTolerancePercent: number
): AttributeScore {
  const requiredValue = String(required.value);
  const offered =
    candidateValue === undefined ? "" : normalizeValue(candidateValue);

  if (offered === "") {
    return { attribute, requiredValue, candidateValue: null, score: 0, rule: "missing" };
  }

  const base = { attribute, requiredValue, candidateValue: String(candidateValue) };
  const wanted = normalizeValue(required.value);

  if (wanted === offered) {
    return { ...base, score: SCORE_EXACT, rule: "exact" };
  }

  switch (required.tolerance) {
    case "exact":
      return { ...base, score: 0, rule: "none" };

    case "numeric-percent": {
      const rq = parseQuantity(wanted);
      const cq = parseQuantity(offered);
      if (!rq || !cq || !unitsCompatible(rq, cq)) {
        return { ...base, score: 0, rule: "none" };
      }
      if (rq.value === cq.value) {
        return { ...base, score: SCORE_EXACT, rule: "exact" };
      }

      const pct = required.tolerancePercent ?? defaultTolerancePercent;
      const band = (Math.abs(rq.value) * pct) / 100;
      if (Math.abs(rq.value - cq.value) <= band + FLOAT_EPSILON) {
        return { ...base, score: SCORE_NUMERIC_TOLERANCE, rule: "numeric-tolerance" };
      }
      return { ...base, score: 0, rule: "none" };
    }

    case "none": {
      const score = textOverlapScore(wanted, offered);
      return { ...base, score, rule: score > 0 ? "text-overlap" : "none" };
    }
  }
}

/**
 * SpecMatch%: simple average over every required attribute, in the
 * item's attribute order. No required attributes scores 0.
 */
export function scoreCandidate(
  item: RequestItem,
  candidate: Candidate,
  defaultTolerancePercent: number
): { score: number; breakdown: AttributeScore[] } {
  const breakdown = Object.entries(item.attributes).map(([name, required]) =>
    scoreAttribute(
      name,
      required,
      findCandidateValue(name, candidate),
      defaultTolerancePercent
    )
  );

  if (breakdown.length === 0) {
    return { score: 0, breakdown };
  }

  const sum = breakdown.reduce((acc, a) => acc + a.score, 0);
  return { score: clampScore(round2(sum / breakdown.length)), breakdown };
}

export function matchLabel(score: number): MatchLabel {
  if (score >= 95) return "Exact Match";
  if (score >= 75) return "Good Match";
  if (score >= 50) return "Partial Match";
  if (score > 0) return "Weak Match";
  return "No Match";
}
