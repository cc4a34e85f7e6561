import {
  INITIAL_STAGE,
  STAGE_INTERVALS_MS,
  TERMINAL_STAGE,
  isSrsStage,
  nextStage,
  type SrsStage,
} from "../../shared/srs.js";
import type { GrammarItem, TransitionResult } from "@shared";
import { InvalidStateError } from "../errors.js";

export function intervalFor(stage: SrsStage): number | null {
  return STAGE_INTERVALS_MS[stage];
}

function assertGradable(stage: unknown): SrsStage {
  if (!isSrsStage(stage)) {
    throw new InvalidStateError(`Unknown SRS stage "${String(stage)}"`);
  }
  if (stage === TERMINAL_STAGE) {
    throw new InvalidStateError("Burned items are never reviewed again");
  }
  return stage;
}

/**
 * Advance one stage on a pass, drop back to Apprentice I on a fail. The due
 * time comes from the interval of the stage the item was graded in.
 */
export function transition(currentStage: SrsStage, now: Date, passed: boolean): TransitionResult {
  const stage = assertGradable(currentStage);

  if (!passed) {
    return {
      newStage: INITIAL_STAGE,
      newDueAt: offset(now, intervalFor(INITIAL_STAGE)),
    };
  }

  const advanced = nextStage(stage);
  return {
    newStage: advanced,
    newDueAt: advanced === TERMINAL_STAGE ? null : offset(now, intervalFor(stage)),
  };
}

function offset(now: Date, intervalMs: number | null): Date {
  return new Date(now.getTime() + Math.max(0, intervalMs ?? 0));
}

export function applyReview(item: GrammarItem, passed: boolean, now: Date): GrammarItem {
  const { newStage, newDueAt } = transition(item.stage, now, passed);

  return {
    ...item,
    stage: newStage,
    dueAt: newDueAt,
    lessonStatus: "in_progress",
    correctCount: item.correctCount + (passed ? 1 : 0),
    incorrectCount: item.incorrectCount + (passed ? 0 : 1),
    lastReviewedAt: now,
    updatedAt: now,
  };
}
