import { z } from "zod";
import { MAX_DAILY_LESSON_LIMIT } from "../config.js";

export const answerSchema = z.object({
  answer: z.string().max(500),
});

export const answerCheckSchema = z.object({
  answer: z.string().max(500),
  meanings: z.array(z.string().max(500)).min(1).max(50),
});

const exampleSchema = z.object({
  japanese: z.string().trim().min(1).max(500),
  english: z.string().trim().max(500).nullable().optional(),
});

export const itemDraftSchema = z.object({
  grammar: z.string().trim().min(1).max(200),
  reading: z.string().trim().max(200).nullable().optional(),
  usage: z.string().trim().max(500).nullable().optional(),
  note: z.string().trim().max(1000).nullable().optional(),
  meanings: z.array(z.string().max(500)).min(1).max(50),
  examples: z.array(exampleSchema).max(10).optional(),
});

export const createItemsSchema = z.object({
  items: z.array(itemDraftSchema).min(1).max(500),
});

export const startLessonsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_DAILY_LESSON_LIMIT).optional(),
});

export const updateSettingsSchema = z
  .object({
    dailyLessonLimit: z.number().int().min(1).max(MAX_DAILY_LESSON_LIMIT).optional(),
    autoStartLessons: z.boolean().optional(),
  })
  .strict();
