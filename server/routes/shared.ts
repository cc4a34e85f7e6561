import type { Response } from "express";
import type { ZodError } from "zod";
import type { GrammarItem } from "@shared";

export function normalizeStringParam(value: unknown): string | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (Array.isArray(value) && value.length > 0) {
    return normalizeStringParam(value[0]);
  }
  return undefined;
}

export function sendError(res: Response, status: number, message: string, code?: string) {
  if (code) {
    return res.status(status).json({ error: message, code });
  }
  return res.status(status).json({ error: message });
}

export function sendValidationError(res: Response, error: ZodError) {
  return res.status(400).json({
    error: "Invalid request",
    code: "INVALID_REQUEST",
    details: error.flatten(),
  });
}

export function toIsoString(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function serialiseItem(item: GrammarItem) {
  return {
    id: item.id,
    grammar: item.grammar,
    reading: item.reading,
    usage: item.usage,
    note: item.note,
    acceptableMeanings: item.acceptableMeanings,
    examples: item.examples,
    stage: item.stage,
    lessonStatus: item.lessonStatus,
    dueAt: toIsoString(item.dueAt),
    correctCount: item.correctCount,
    incorrectCount: item.incorrectCount,
    lastReviewedAt: toIsoString(item.lastReviewedAt),
    createdAt: item.createdAt.toISOString(),
    updatedAt: item.updatedAt.toISOString(),
  };
}

export type SerialisedItem = ReturnType<typeof serialiseItem>;
