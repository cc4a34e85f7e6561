import { Router } from "express";
import { evaluate } from "../answers/index.js";
import type { ReviewService } from "../review/service.js";
import { answerCheckSchema, answerSchema } from "./schemas.js";
import { normalizeStringParam, sendError, sendValidationError, serialiseItem, toIsoString } from "./shared.js";

export function createReviewRouter(service: ReviewService): Router {
  const router = Router();

  router.get("/reviews/due", async (_req, res, next) => {
    try {
      const items = await service.getDueReviews();
      res.json({ count: items.length, items: items.map(serialiseItem) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/reviews/make-due", async (_req, res, next) => {
    try {
      const updated = await service.makeAllDue();
      res.json({ updated });
    } catch (error) {
      next(error);
    }
  });

  router.post("/reviews/:id/answer", async (req, res, next) => {
    const itemId = normalizeStringParam(req.params.id);
    if (!itemId) {
      return sendError(res, 400, "Item identifier required", "ITEM_ID_REQUIRED");
    }

    const parsed = answerSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const outcome = await service.submitAnswer(itemId, parsed.data.answer);
      res.json({
        result: outcome.result,
        evaluation: outcome.evaluation,
        transition: {
          newStage: outcome.transition.newStage,
          newDueAt: toIsoString(outcome.transition.newDueAt),
        },
        item: serialiseItem(outcome.item),
      });
    } catch (error) {
      next(error);
    }
  });

  // Grades without touching any item, for previews and typing feedback.
  router.post("/answers/check", (req, res, next) => {
    const parsed = answerCheckSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      res.json(evaluate(parsed.data.answer, parsed.data.meanings));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
