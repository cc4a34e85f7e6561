import type { LessonStatus, SrsStage, SrsStageGroup } from './srs.js';

export type ReviewResult = 'correct' | 'incorrect';

export interface GrammarExample {
  japanese: string;
  english: string | null;
}

export interface GrammarItem {
  id: string;
  grammar: string;
  reading: string | null;
  usage: string | null;
  note: string | null;
  acceptableMeanings: string[];
  examples: GrammarExample[];
  stage: SrsStage;
  lessonStatus: LessonStatus;
  /** Null while the item is Burned or has not been released as a lesson. */
  dueAt: Date | null;
  correctCount: number;
  incorrectCount: number;
  lastReviewedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  version: number;
}

export interface NewGrammarItem {
  id: string;
  grammar: string;
  reading: string | null;
  usage: string | null;
  note: string | null;
  acceptableMeanings: string[];
  examples: GrammarExample[];
  stage: SrsStage;
  lessonStatus: LessonStatus;
  dueAt: Date | null;
  createdAt: Date;
}

export interface GrammarItemDraft {
  grammar: string;
  reading?: string | null;
  usage?: string | null;
  note?: string | null;
  meanings: string[];
  examples?: Array<{ japanese: string; english?: string | null }>;
}

export interface EvaluationResult {
  bestMatch: string;
  score: number;
  passed: boolean;
}

export interface TransitionResult {
  newStage: SrsStage;
  newDueAt: Date | null;
}

export interface ReviewOutcome {
  evaluation: EvaluationResult;
  transition: TransitionResult;
  result: ReviewResult;
  item: GrammarItem;
}

export type LessonSummary = Record<LessonStatus, number>;

export interface ReviewStatistics {
  stages: Record<SrsStage, number>;
  groups: Record<SrsStageGroup, number>;
  totalItems: number;
  dueNow: number;
  totalReviews: number;
  totalCorrect: number;
  /** Percentage with one decimal, 0 when nothing has been reviewed. */
  accuracy: number;
}

export interface ReviewSettings {
  dailyLessonLimit: number;
  autoStartLessons: boolean;
}
