import { Router } from "express";
import type { ReviewService } from "../review/service.js";
import { startLessonsSchema, updateSettingsSchema } from "./schemas.js";
import { sendValidationError, serialiseItem } from "./shared.js";

export function createLessonRouter(service: ReviewService): Router {
  const router = Router();

  router.post("/lessons/start", async (req, res, next) => {
    const parsed = startLessonsSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const items = await service.startLessons(parsed.data.limit);
      res.json({ started: items.length, items: items.map(serialiseItem) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/lessons/summary", async (_req, res, next) => {
    try {
      res.json(await service.getLessonSummary());
    } catch (error) {
      next(error);
    }
  });

  router.get("/stats", async (_req, res, next) => {
    try {
      res.json(await service.getStatistics());
    } catch (error) {
      next(error);
    }
  });

  router.post("/progress/reset", async (_req, res, next) => {
    try {
      const reset = await service.resetAllProgress();
      res.json({ reset });
    } catch (error) {
      next(error);
    }
  });

  router.get("/settings", async (_req, res, next) => {
    try {
      res.json(await service.getSettings());
    } catch (error) {
      next(error);
    }
  });

  router.put("/settings", async (req, res, next) => {
    const parsed = updateSettingsSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      res.json(await service.updateSettings(parsed.data));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
