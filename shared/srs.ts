export const SRS_STAGES = [
  "Apprentice I",
  "Apprentice II",
  "Apprentice III",
  "Apprentice IV",
  "Guru I",
  "Guru II",
  "Master",
  "Enlightened",
  "Burned",
] as const;

export type SrsStage = (typeof SRS_STAGES)[number];

export const INITIAL_STAGE: SrsStage = "Apprentice I";
export const TERMINAL_STAGE: SrsStage = "Burned";

export type SrsStageGroup = "apprentice" | "guru" | "master" | "enlightened" | "burned";

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Time until the next review once an item passes a review while sitting in
 * the keyed stage. Months are 30 days.
 */
export const STAGE_INTERVALS_MS: Readonly<Record<SrsStage, number | null>> = {
  "Apprentice I": 4 * HOUR_MS,
  "Apprentice II": 8 * HOUR_MS,
  "Apprentice III": DAY_MS,
  "Apprentice IV": 2 * DAY_MS,
  "Guru I": 7 * DAY_MS,
  "Guru II": 14 * DAY_MS,
  Master: 30 * DAY_MS,
  Enlightened: 120 * DAY_MS,
  Burned: null,
};

export const LESSON_STATUSES = ["not_started", "available", "in_progress"] as const;

export type LessonStatus = (typeof LESSON_STATUSES)[number];

export function isSrsStage(value: unknown): value is SrsStage {
  return SRS_STAGES.some((stage) => stage === value);
}

export function stageIndex(stage: SrsStage): number {
  return SRS_STAGES.indexOf(stage);
}

export function nextStage(stage: SrsStage): SrsStage {
  const index = stageIndex(stage);
  return SRS_STAGES[Math.min(index + 1, SRS_STAGES.length - 1)] ?? TERMINAL_STAGE;
}

export function stageGroup(stage: SrsStage): SrsStageGroup {
  if (stage.startsWith("Apprentice")) return "apprentice";
  if (stage.startsWith("Guru")) return "guru";
  if (stage === "Master") return "master";
  if (stage === "Enlightened") return "enlightened";
  return "burned";
}
