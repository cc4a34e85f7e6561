import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";

import { registerRoutes, type RouteDependencies } from "../routes.js";
import { logError } from "../logger.js";
import { isReviewError } from "../errors.js";
import { requestLogger } from "../middleware/request-logger.js";
import { buildCorsOptions, resolveAllowedOrigins } from "../config/cors.js";

export interface CreateApiAppOptions extends RouteDependencies {
  /**
   * Enable CORS middleware. Enabled by default to mirror the production API.
   */
  enableCors?: boolean;
  /**
   * Optional explicit list of origins allowed by CORS.
   */
  allowedOrigins?: readonly string[];
}

type HttpError = Error & { status?: number; statusCode?: number; code?: string };

function isHttpError(error: unknown): error is HttpError {
  return error instanceof Error;
}

export function createApiApp(options: CreateApiAppOptions): Express {
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  const isProduction = (process.env.NODE_ENV ?? "development") === "production";

  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      frameguard: { action: "deny" },
      hsts: isProduction
        ? {
            maxAge: 63072000,
            includeSubDomains: true,
          }
        : false,
      referrerPolicy: { policy: "no-referrer" },
    }),
  );

  app.use(requestLogger);

  if (options.enableCors ?? true) {
    const configuredOrigins = resolveAllowedOrigins({
      explicitOrigins: options.allowedOrigins,
      envOrigins: process.env.APP_ORIGIN,
    });

    app.use(cors(buildCorsOptions(configuredOrigins)));
  }

  app.use(express.json({ limit: "1mb" }));

  registerRoutes(app, options);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not Found", code: "NOT_FOUND" });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isReviewError(error)) {
      res.status(error.status).json({ error: error.message, code: error.code });
      return;
    }

    const status = isHttpError(error) ? error.status ?? error.statusCode ?? 500 : 500;
    const exposeMessage = isHttpError(error) && (status < 500 || status === 503);
    const message = exposeMessage ? error.message : "Internal Server Error";

    if (status >= 500) {
      logError(error, "api");
    }

    if (res.headersSent) {
      res.end();
      return;
    }

    res.status(status).json({ error: message });
  });

  return app;
}
