import type { CorsOptions } from "cors";

export const DEVELOPMENT_ORIGINS: readonly string[] = [
  "http://localhost:5000",
  "http://127.0.0.1:5000",
  "http://localhost:5173",
  "http://127.0.0.1:5173",
];

export function parseOriginList(value?: string | readonly string[]): string[] {
  if (!value) {
    return [];
  }

  const source = typeof value === "string" ? value.split(",") : value;
  return Array.from(new Set(source.map((origin) => origin.trim()).filter(Boolean)));
}

export interface ResolveAllowedOriginsOptions {
  explicitOrigins?: readonly string[];
  envOrigins?: string;
  nodeEnv?: string;
}

/**
 * Explicit origins win over APP_ORIGIN. Production refuses to start without
 * either; other environments fall back to the local dev servers.
 */
export function resolveAllowedOrigins(options: ResolveAllowedOriginsOptions = {}): readonly string[] {
  const explicit = parseOriginList(options.explicitOrigins);
  if (explicit.length > 0) {
    return explicit;
  }

  const fromEnv = parseOriginList(options.envOrigins);
  if (fromEnv.length > 0) {
    return fromEnv;
  }

  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV ?? "development";
  if (nodeEnv === "production") {
    throw new Error(
      "APP_ORIGIN must be configured with at least one allowed origin when NODE_ENV is set to production.",
    );
  }

  return DEVELOPMENT_ORIGINS;
}

export function buildCorsOptions(allowedOrigins: readonly string[]): CorsOptions {
  if (allowedOrigins.length === 0) {
    throw new Error("An allow list of origins is required to configure CORS.");
  }

  return {
    origin(origin, callback) {
      if (!origin || allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        callback(Object.assign(new Error("Not allowed by CORS"), { status: 403 }));
      }
    },
  } satisfies CorsOptions;
}
