import { Router } from "express";
import type { ReviewService } from "../review/service.js";
import { createItemsSchema } from "./schemas.js";
import { normalizeStringParam, sendError, sendValidationError, serialiseItem } from "./shared.js";

export function createItemRouter(service: ReviewService): Router {
  const router = Router();

  router.post("/items", async (req, res, next) => {
    const parsed = createItemsSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      const items = await service.addItems(parsed.data.items);
      res.status(201).json({ count: items.length, items: items.map(serialiseItem) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/items/:id", async (req, res, next) => {
    const itemId = normalizeStringParam(req.params.id);
    if (!itemId) {
      return sendError(res, 400, "Item identifier required", "ITEM_ID_REQUIRED");
    }

    try {
      const item = await service.getItem(itemId);
      res.json(serialiseItem(item));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
