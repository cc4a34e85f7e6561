import { normaliseAnswer } from "../../shared/text-normalizer.js";
import type { EvaluationResult } from "@shared";
import { InvalidInputError } from "../errors.js";
import { similarity } from "./similarity.js";

export const PASS_THRESHOLD = 0.75;

// Canonical meanings pack variants ("is/am/are") and partial senses
// ("too; also") into one string.
const PART_DELIMITERS = /[;/,.!?]/;

export interface AnswerCandidate {
  /** Candidate as written, shown back to the learner. */
  display: string;
  normalized: string;
}

export function expandCandidates(meanings: readonly string[]): AnswerCandidate[] {
  const candidates: AnswerCandidate[] = [];

  for (const meaning of meanings) {
    const full = meaning.trim();
    const fullNormalized = normaliseAnswer(full);
    if (fullNormalized) {
      candidates.push({ display: full, normalized: fullNormalized });
    }

    for (const rawPart of full.split(PART_DELIMITERS)) {
      const part = rawPart.trim();
      if (!part || part === full) continue;
      const normalized = normaliseAnswer(part);
      if (!normalized) continue;
      candidates.push({ display: part, normalized });
    }
  }

  return candidates;
}

export function evaluate(typedAnswer: string, acceptableMeanings: readonly string[]): EvaluationResult {
  if (acceptableMeanings.length === 0) {
    throw new InvalidInputError("At least one acceptable meaning is required to grade an answer");
  }

  const candidates = expandCandidates(acceptableMeanings);
  const typed = normaliseAnswer(typedAnswer);

  let bestMatch = candidates[0]?.display ?? acceptableMeanings[0].trim();
  let bestScore = 0;

  if (typed) {
    for (const candidate of candidates) {
      const score = similarity(typed, candidate.normalized);
      // Strictly greater keeps the first candidate on ties.
      if (score > bestScore) {
        bestScore = score;
        bestMatch = candidate.display;
      }
    }
  }

  return {
    bestMatch,
    score: bestScore,
    passed: bestScore >= PASS_THRESHOLD,
  };
}
