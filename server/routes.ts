import type { Express } from "express";
import type { ReviewService } from "./review/service.js";
import { createHealthRouter, type ReadinessProbe } from "./routes/health.js";
import { createItemRouter } from "./routes/items.js";
import { createLessonRouter } from "./routes/lessons.js";
import { createReviewRouter } from "./routes/reviews.js";

export interface RouteDependencies {
  service: ReviewService;
  readinessProbe?: ReadinessProbe;
}

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  app.use(createHealthRouter(deps.readinessProbe));
  app.use("/api", createReviewRouter(deps.service));
  app.use("/api", createItemRouter(deps.service));
  app.use("/api", createLessonRouter(deps.service));
}
