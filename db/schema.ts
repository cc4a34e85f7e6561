import type { GrammarExample } from "@shared";
import { index, integer, jsonb, pgTable, text, timestamp } from "drizzle-orm/pg-core";
import { LESSON_STATUSES, SRS_STAGES } from "../shared/srs.js";

export const grammarItems = pgTable(
  "grammar_items",
  {
    id: text("id").primaryKey(),
    grammar: text("grammar").notNull(),
    reading: text("reading"),
    usage: text("usage"),
    note: text("note"),
    meanings: jsonb("meanings").$type<string[]>().notNull(),
    examples: jsonb("examples").$type<GrammarExample[]>().notNull(),
    stage: text("stage", { enum: SRS_STAGES }).notNull().default("Apprentice I"),
    lessonStatus: text("lesson_status", { enum: LESSON_STATUSES }).notNull().default("not_started"),
    dueAt: timestamp("due_at", { withTimezone: true }),
    correctCount: integer("correct_count").notNull().default(0),
    incorrectCount: integer("incorrect_count").notNull().default(0),
    lastReviewedAt: timestamp("last_reviewed_at", { withTimezone: true }),
    version: integer("version").notNull().default(1),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => [
    index("grammar_items_due_idx").on(table.dueAt),
    index("grammar_items_stage_idx").on(table.stage),
  ],
);

export const settings = pgTable("settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
});

export type GrammarItemRow = typeof grammarItems.$inferSelect;

export interface SchemaTableDefinition {
  name: string;
  /** CREATE TABLE first, then its indexes. */
  statements: readonly string[];
}

export const SCHEMA_TABLES: readonly SchemaTableDefinition[] = [
  {
    name: "grammar_items",
    statements: [
      `CREATE TABLE IF NOT EXISTS "grammar_items" (
        "id" text PRIMARY KEY,
        "grammar" text NOT NULL,
        "reading" text,
        "usage" text,
        "note" text,
        "meanings" jsonb NOT NULL,
        "examples" jsonb NOT NULL,
        "stage" text NOT NULL DEFAULT 'Apprentice I',
        "lesson_status" text NOT NULL DEFAULT 'not_started',
        "due_at" timestamp with time zone,
        "correct_count" integer NOT NULL DEFAULT 0,
        "incorrect_count" integer NOT NULL DEFAULT 0,
        "last_reviewed_at" timestamp with time zone,
        "version" integer NOT NULL DEFAULT 1,
        "created_at" timestamp with time zone NOT NULL,
        "updated_at" timestamp with time zone NOT NULL
      )`,
      `CREATE INDEX IF NOT EXISTS "grammar_items_due_idx" ON "grammar_items" ("due_at")`,
      `CREATE INDEX IF NOT EXISTS "grammar_items_stage_idx" ON "grammar_items" ("stage")`,
    ],
  },
  {
    name: "settings",
    statements: [
      `CREATE TABLE IF NOT EXISTS "settings" (
        "key" text PRIMARY KEY,
        "value" text NOT NULL
      )`,
    ],
  },
];
