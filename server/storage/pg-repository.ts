import { and, asc, eq, inArray, lte, ne, sql } from "drizzle-orm";
import { z } from "zod";
import type { GrammarItem, LessonStatus, NewGrammarItem } from "@shared";
import { grammarItems, settings, type Database, type GrammarItemRow } from "../../db/index.js";
import { INITIAL_STAGE, LESSON_STATUSES, SRS_STAGES, TERMINAL_STAGE } from "../../shared/srs.js";
import { ConcurrentUpdateError, NotFoundError } from "../errors.js";
import type { GrammarRepository } from "./repository.js";

const grammarItemRowSchema = z.object({
  id: z.string().min(1),
  grammar: z.string(),
  reading: z.string().nullable(),
  usage: z.string().nullable(),
  note: z.string().nullable(),
  meanings: z.array(z.string()).min(1),
  examples: z.array(
    z.object({
      japanese: z.string(),
      english: z.string().nullable(),
    }),
  ),
  stage: z.enum(SRS_STAGES),
  lessonStatus: z.enum(LESSON_STATUSES),
  dueAt: z.coerce.date().nullable(),
  correctCount: z.number().int().min(0),
  incorrectCount: z.number().int().min(0),
  lastReviewedAt: z.coerce.date().nullable(),
  version: z.number().int().min(1),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export function toGrammarItem(row: GrammarItemRow): GrammarItem {
  const parsed = grammarItemRowSchema.parse(row);
  const { meanings, ...rest } = parsed;
  return { ...rest, acceptableMeanings: meanings };
}

const bumpVersion = sql`${grammarItems.version} + 1`;

export class PgGrammarRepository implements GrammarRepository {
  constructor(private readonly db: Database) {}

  async listDue(now: Date): Promise<GrammarItem[]> {
    const rows = await this.db
      .select()
      .from(grammarItems)
      .where(
        and(
          ne(grammarItems.lessonStatus, "not_started"),
          ne(grammarItems.stage, TERMINAL_STAGE),
          lte(grammarItems.dueAt, now),
        ),
      )
      .orderBy(asc(grammarItems.dueAt), asc(grammarItems.createdAt));
    return rows.map(toGrammarItem);
  }

  async findById(id: string): Promise<GrammarItem | null> {
    const [row] = await this.db.select().from(grammarItems).where(eq(grammarItems.id, id)).limit(1);
    return row ? toGrammarItem(row) : null;
  }

  async listAll(): Promise<GrammarItem[]> {
    const rows = await this.db
      .select()
      .from(grammarItems)
      .orderBy(asc(grammarItems.createdAt), asc(grammarItems.id));
    return rows.map(toGrammarItem);
  }

  async listByLessonStatus(status: LessonStatus): Promise<GrammarItem[]> {
    const rows = await this.db
      .select()
      .from(grammarItems)
      .where(eq(grammarItems.lessonStatus, status))
      .orderBy(asc(grammarItems.createdAt), asc(grammarItems.id));
    return rows.map(toGrammarItem);
  }

  async insertMany(items: readonly NewGrammarItem[]): Promise<GrammarItem[]> {
    if (!items.length) {
      return [];
    }

    const rows = await this.db
      .insert(grammarItems)
      .values(
        items.map((item) => ({
          id: item.id,
          grammar: item.grammar,
          reading: item.reading,
          usage: item.usage,
          note: item.note,
          meanings: item.acceptableMeanings,
          examples: item.examples,
          stage: item.stage,
          lessonStatus: item.lessonStatus,
          dueAt: item.dueAt,
          correctCount: 0,
          incorrectCount: 0,
          lastReviewedAt: null,
          version: 1,
          createdAt: item.createdAt,
          updatedAt: item.createdAt,
        })),
      )
      .returning();

    const byId = new Map(rows.map((row) => [row.id, toGrammarItem(row)]));
    return items.flatMap((item) => byId.get(item.id) ?? []);
  }

  async saveProgress(item: GrammarItem, expectedVersion: number): Promise<GrammarItem> {
    const [row] = await this.db
      .update(grammarItems)
      .set({
        stage: item.stage,
        lessonStatus: item.lessonStatus,
        dueAt: item.dueAt,
        correctCount: item.correctCount,
        incorrectCount: item.incorrectCount,
        lastReviewedAt: item.lastReviewedAt,
        updatedAt: item.updatedAt,
        version: expectedVersion + 1,
      })
      .where(and(eq(grammarItems.id, item.id), eq(grammarItems.version, expectedVersion)))
      .returning();

    if (row) {
      return toGrammarItem(row);
    }

    const current = await this.findById(item.id);
    if (!current) {
      throw new NotFoundError(item.id);
    }
    throw new ConcurrentUpdateError(item.id, expectedVersion);
  }

  async releaseLessons(limit: number, now: Date): Promise<GrammarItem[]> {
    if (limit <= 0) {
      return [];
    }

    const candidates = await this.db
      .select({ id: grammarItems.id })
      .from(grammarItems)
      .where(eq(grammarItems.lessonStatus, "not_started"))
      .orderBy(asc(grammarItems.createdAt), asc(grammarItems.id))
      .limit(limit);

    if (!candidates.length) {
      return [];
    }

    const ids = candidates.map((candidate) => candidate.id);
    const rows = await this.db
      .update(grammarItems)
      .set({
        lessonStatus: "available",
        dueAt: now,
        updatedAt: now,
        version: bumpVersion,
      })
      .where(and(inArray(grammarItems.id, ids), eq(grammarItems.lessonStatus, "not_started")))
      .returning();

    const released = new Map(rows.map((row) => [row.id, toGrammarItem(row)]));
    return ids.flatMap((id) => released.get(id) ?? []);
  }

  async makeAllDue(now: Date): Promise<number> {
    const rows = await this.db
      .update(grammarItems)
      .set({ dueAt: now, updatedAt: now, version: bumpVersion })
      .where(and(ne(grammarItems.lessonStatus, "not_started"), ne(grammarItems.stage, TERMINAL_STAGE)))
      .returning({ id: grammarItems.id });
    return rows.length;
  }

  async resetAllProgress(now: Date): Promise<number> {
    const rows = await this.db
      .update(grammarItems)
      .set({
        stage: INITIAL_STAGE,
        lessonStatus: "not_started",
        dueAt: null,
        correctCount: 0,
        incorrectCount: 0,
        lastReviewedAt: null,
        updatedAt: now,
        version: bumpVersion,
      })
      .returning({ id: grammarItems.id });
    return rows.length;
  }

  async getSetting(key: string): Promise<string | null> {
    const [row] = await this.db
      .select({ value: settings.value })
      .from(settings)
      .where(eq(settings.key, key))
      .limit(1);
    return row?.value ?? null;
  }

  async setSetting(key: string, value: string): Promise<void> {
    await this.db
      .insert(settings)
      .values({ key, value })
      .onConflictDoUpdate({ target: settings.key, set: { value } });
  }
}
