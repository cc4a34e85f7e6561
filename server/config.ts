import type { ReviewSettings } from "@shared";

const TRUE_VALUES = new Set(["1", "true", "yes", "y", "on", "enabled"]);
const FALSE_VALUES = new Set(["0", "false", "no", "n", "off", "disabled"]);

export const DEFAULT_PORT = 5000;
export const DEFAULT_DAILY_LESSON_LIMIT = 15;
export const MAX_DAILY_LESSON_LIMIT = 100;

export function parseBooleanFlag(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === null) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }

  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return defaultValue;
}

export function parseIntegerSetting(
  value: string | undefined | null,
  defaultValue: number,
  bounds: { min: number; max: number },
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < bounds.min) {
    return defaultValue;
  }
  return Math.min(parsed, bounds.max);
}

function resolveNodeEnv(): string {
  return process.env.NODE_ENV ?? "development";
}

export function isRequestPayloadLoggingEnabled(): boolean {
  const requested = parseBooleanFlag(process.env.ENABLE_REQUEST_PAYLOAD_LOGGING, false);
  if (!requested) {
    return false;
  }

  return resolveNodeEnv() !== "production";
}

export function getPort(): number {
  return parseIntegerSetting(process.env.PORT, DEFAULT_PORT, { min: 1, max: 65535 });
}

export function getDefaultReviewSettings(): ReviewSettings {
  return {
    dailyLessonLimit: parseIntegerSetting(process.env.DAILY_LESSON_LIMIT, DEFAULT_DAILY_LESSON_LIMIT, {
      min: 1,
      max: MAX_DAILY_LESSON_LIMIT,
    }),
    autoStartLessons: parseBooleanFlag(process.env.AUTO_START_LESSONS, true),
  };
}
