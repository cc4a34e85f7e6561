import type { NextFunction, Request, RequestHandler, Response } from "express";

import { log } from "../logger.js";
import { isRequestPayloadLoggingEnabled } from "../config.js";

const SOURCE = "http";

export interface RequestLoggerOptions {
  /**
   * Override the payload logging behaviour. Primarily exposed for tests.
   */
  logPayloads?: boolean;
}

export function buildLogLine(
  req: Request,
  res: Response,
  durationMs: number,
  capturedResponse?: unknown,
): string {
  const method = req.method ?? "UNKNOWN";
  const route = req.originalUrl ?? req.url ?? "";
  const status = res.statusCode ?? 0;

  let logLine = `${method} ${route} ${status} in ${durationMs}ms`;

  if (capturedResponse !== undefined) {
    try {
      logLine += ` :: ${JSON.stringify(capturedResponse)}`;
    } catch {
      logLine += " :: [unserializable payload]";
    }
  }

  return logLine;
}

export function createRequestLogger(options: RequestLoggerOptions = {}): RequestHandler {
  return function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const isApiRoute = (req.originalUrl ?? req.url ?? "").startsWith("/api");
    if (!isApiRoute) {
      return next();
    }

    const shouldLogPayload = options.logPayloads ?? isRequestPayloadLoggingEnabled();
    const start = Date.now();
    let capturedResponse: unknown;

    if (shouldLogPayload) {
      const originalJson = res.json.bind(res);
      res.json = (body: unknown): Response => {
        capturedResponse = body;
        return originalJson(body);
      };
    }

    res.on("finish", () => {
      log(buildLogLine(req, res, Date.now() - start, capturedResponse), SOURCE);
    });

    next();
  };
}

export const requestLogger = createRequestLogger();
