import { randomUUID } from "node:crypto";
import type {
  GrammarItem,
  GrammarItemDraft,
  LessonSummary,
  NewGrammarItem,
  ReviewOutcome,
  ReviewSettings,
  ReviewStatistics,
} from "@shared";
import { INITIAL_STAGE, LESSON_STATUSES, TERMINAL_STAGE, stageGroup } from "../../shared/srs.js";
import { normaliseText } from "../../shared/text-normalizer.js";
import { evaluate } from "../answers/index.js";
import { MAX_DAILY_LESSON_LIMIT, getDefaultReviewSettings, parseBooleanFlag, parseIntegerSetting } from "../config.js";
import { InvalidInputError, InvalidStateError, NotFoundError } from "../errors.js";
import { logStructured } from "../logger.js";
import { applyReview } from "../srs/index.js";
import { systemClock, type Clock, type GrammarRepository } from "../storage/repository.js";

const SOURCE = "review-service";

export const SETTING_KEYS = {
  dailyLessonLimit: "daily_lesson_limit",
  autoStartLessons: "auto_start_lessons",
} as const;

export interface ReviewServiceOptions {
  repository: GrammarRepository;
  clock?: Clock;
  defaults?: ReviewSettings;
  generateId?: () => string;
}

function isDue(item: GrammarItem, now: Date): boolean {
  return item.dueAt !== null && item.dueAt.getTime() <= now.getTime();
}

function cleanMeanings(meanings: readonly string[]): string[] {
  return meanings.flatMap((meaning) => normaliseText(meaning) ?? []);
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function createReviewService(options: ReviewServiceOptions) {
  const { repository } = options;
  const clock = options.clock ?? systemClock;
  const defaults = options.defaults ?? getDefaultReviewSettings();
  const generateId = options.generateId ?? randomUUID;

  async function getSettings(): Promise<ReviewSettings> {
    const [limit, autoStart] = await Promise.all([
      repository.getSetting(SETTING_KEYS.dailyLessonLimit),
      repository.getSetting(SETTING_KEYS.autoStartLessons),
    ]);

    return {
      dailyLessonLimit: parseIntegerSetting(limit, defaults.dailyLessonLimit, {
        min: 1,
        max: MAX_DAILY_LESSON_LIMIT,
      }),
      autoStartLessons: parseBooleanFlag(autoStart ?? undefined, defaults.autoStartLessons),
    };
  }

  async function updateSettings(patch: Partial<ReviewSettings>): Promise<ReviewSettings> {
    if (patch.dailyLessonLimit !== undefined) {
      const limit = patch.dailyLessonLimit;
      if (!Number.isInteger(limit) || limit < 1 || limit > MAX_DAILY_LESSON_LIMIT) {
        throw new InvalidInputError(`Daily lesson limit must be between 1 and ${MAX_DAILY_LESSON_LIMIT}`);
      }
      await repository.setSetting(SETTING_KEYS.dailyLessonLimit, String(limit));
    }
    if (patch.autoStartLessons !== undefined) {
      await repository.setSetting(SETTING_KEYS.autoStartLessons, patch.autoStartLessons ? "true" : "false");
    }
    return getSettings();
  }

  async function getDueReviews(): Promise<GrammarItem[]> {
    return repository.listDue(clock.now());
  }

  async function getItem(itemId: string): Promise<GrammarItem> {
    const item = await repository.findById(itemId);
    if (!item) {
      throw new NotFoundError(itemId);
    }
    return item;
  }

  async function submitAnswer(itemId: string, typedAnswer: string): Promise<ReviewOutcome> {
    const now = clock.now();
    const item = await getItem(itemId);

    if (item.stage === TERMINAL_STAGE) {
      throw new InvalidStateError(`Grammar item "${itemId}" is burned and no longer reviewed`);
    }
    if (item.lessonStatus === "not_started") {
      throw new InvalidStateError(`Grammar item "${itemId}" has not been released as a lesson yet`);
    }
    if (!isDue(item, now)) {
      throw new InvalidStateError(`Grammar item "${itemId}" is not due for review yet`);
    }

    const evaluation = evaluate(typedAnswer, item.acceptableMeanings);
    const reviewed = applyReview(item, evaluation.passed, now);
    const saved = await repository.saveProgress(reviewed, item.version);

    logStructured({
      event: "review.graded",
      source: SOURCE,
      data: {
        itemId,
        passed: evaluation.passed,
        score: Number(evaluation.score.toFixed(4)),
        fromStage: item.stage,
        toStage: saved.stage,
        dueAt: saved.dueAt?.toISOString() ?? null,
      },
    });

    return {
      evaluation,
      transition: { newStage: saved.stage, newDueAt: saved.dueAt },
      result: evaluation.passed ? "correct" : "incorrect",
      item: saved,
    };
  }

  async function addItems(drafts: readonly GrammarItemDraft[]): Promise<GrammarItem[]> {
    const now = clock.now();
    const { autoStartLessons } = await getSettings();

    const items = drafts.map((draft, index): NewGrammarItem => {
      const grammar = normaliseText(draft.grammar);
      if (!grammar) {
        throw new InvalidInputError(`Item ${index + 1} is missing its grammar point`);
      }
      const acceptableMeanings = cleanMeanings(draft.meanings);
      if (!acceptableMeanings.length) {
        throw new InvalidInputError(`Item ${index + 1} (${grammar}) needs at least one meaning`);
      }

      return {
        id: generateId(),
        grammar,
        reading: normaliseText(draft.reading),
        usage: normaliseText(draft.usage),
        note: normaliseText(draft.note),
        acceptableMeanings,
        examples: (draft.examples ?? []).flatMap((example) => {
          const japanese = normaliseText(example.japanese);
          return japanese ? [{ japanese, english: normaliseText(example.english) }] : [];
        }),
        stage: INITIAL_STAGE,
        lessonStatus: autoStartLessons ? "available" : "not_started",
        dueAt: autoStartLessons ? now : null,
        createdAt: now,
      };
    });

    const inserted = await repository.insertMany(items);
    logStructured({
      event: "items.imported",
      source: SOURCE,
      data: { count: inserted.length, autoStartLessons },
    });
    return inserted;
  }

  async function startLessons(limit?: number): Promise<GrammarItem[]> {
    const requested = limit ?? (await getSettings()).dailyLessonLimit;
    if (!Number.isInteger(requested) || requested < 1) {
      throw new InvalidInputError("Lesson limit must be a positive integer");
    }
    const released = await repository.releaseLessons(requested, clock.now());
    logStructured({
      event: "lessons.started",
      source: SOURCE,
      data: { requested, released: released.length },
    });
    return released;
  }

  async function getLessonSummary(): Promise<LessonSummary> {
    const [notStarted, available, inProgress] = await Promise.all(
      LESSON_STATUSES.map((status) => repository.listByLessonStatus(status)),
    );
    return {
      not_started: notStarted.length,
      available: available.length,
      in_progress: inProgress.length,
    };
  }

  async function getStatistics(): Promise<ReviewStatistics> {
    const now = clock.now();
    const items = await repository.listAll();

    const stages: ReviewStatistics["stages"] = {
      "Apprentice I": 0,
      "Apprentice II": 0,
      "Apprentice III": 0,
      "Apprentice IV": 0,
      "Guru I": 0,
      "Guru II": 0,
      Master: 0,
      Enlightened: 0,
      Burned: 0,
    };
    const groups: ReviewStatistics["groups"] = {
      apprentice: 0,
      guru: 0,
      master: 0,
      enlightened: 0,
      burned: 0,
    };
    let dueNow = 0;
    let totalCorrect = 0;
    let totalReviews = 0;

    for (const item of items) {
      stages[item.stage] += 1;
      groups[stageGroup(item.stage)] += 1;
      if (item.lessonStatus !== "not_started" && item.stage !== TERMINAL_STAGE && isDue(item, now)) {
        dueNow += 1;
      }
      totalCorrect += item.correctCount;
      totalReviews += item.correctCount + item.incorrectCount;
    }

    return {
      stages,
      groups,
      totalItems: items.length,
      dueNow,
      totalReviews,
      totalCorrect,
      accuracy: totalReviews > 0 ? roundToTenth((totalCorrect / totalReviews) * 100) : 0,
    };
  }

  async function makeAllDue(): Promise<number> {
    const count = await repository.makeAllDue(clock.now());
    logStructured({ event: "reviews.made-due", source: SOURCE, data: { count } });
    return count;
  }

  async function resetAllProgress(): Promise<number> {
    const count = await repository.resetAllProgress(clock.now());
    logStructured({ event: "progress.reset", level: "warn", source: SOURCE, data: { count } });
    return count;
  }

  return {
    getDueReviews,
    getItem,
    submitAnswer,
    addItems,
    startLessons,
    getLessonSummary,
    getStatistics,
    makeAllDue,
    resetAllProgress,
    getSettings,
    updateSettings,
  };
}

export type ReviewService = ReturnType<typeof createReviewService>;
