import type { GrammarItem, LessonStatus, NewGrammarItem } from "@shared";

/**
 * Persistence boundary for grammar items. Implementations serialise writes per
 * item: `saveProgress` only succeeds when the stored version still equals
 * `expectedVersion`.
 */
export interface GrammarRepository {
  listDue(now: Date): Promise<GrammarItem[]>;
  findById(id: string): Promise<GrammarItem | null>;
  listAll(): Promise<GrammarItem[]>;
  listByLessonStatus(status: LessonStatus): Promise<GrammarItem[]>;
  insertMany(items: readonly NewGrammarItem[]): Promise<GrammarItem[]>;
  saveProgress(item: GrammarItem, expectedVersion: number): Promise<GrammarItem>;
  releaseLessons(limit: number, now: Date): Promise<GrammarItem[]>;
  makeAllDue(now: Date): Promise<number>;
  resetAllProgress(now: Date): Promise<number>;
  getSetting(key: string): Promise<string | null>;
  setSetting(key: string, value: string): Promise<void>;
}

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
