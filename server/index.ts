import { createServer } from "node:http";
import type { Socket } from "node:net";

import { createApiApp } from "./api/app.js";
import { getPort } from "./config.js";
import { log, logError } from "./logger.js";
import { createReviewService } from "./review/service.js";
import { PgGrammarRepository } from "./storage/pg-repository.js";
import { databaseReadinessProbe } from "./routes/health.js";
import { ensureSchema, getDb, getPool } from "../db/index.js";

process.env.NODE_ENV = process.env.NODE_ENV ?? "development";

let serverInstance: ReturnType<typeof createServer> | undefined;
let isShuttingDown = false;
const trackedSockets = new Set<Socket>();

function trackConnections(server: ReturnType<typeof createServer>): void {
  server.on("connection", (socket) => {
    trackedSockets.add(socket);
    socket.once("close", () => {
      trackedSockets.delete(socket);
    });
  });
}

function destroyOpenSockets(): void {
  for (const socket of trackedSockets) {
    socket.destroy();
    trackedSockets.delete(socket);
  }
}

async function closeServer(): Promise<void> {
  const instance = serverInstance;

  if (!instance) {
    return;
  }

  destroyOpenSockets();
  await new Promise<void>((resolve, reject) => {
    instance.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });

  serverInstance = undefined;
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  log(`received ${signal}, starting graceful shutdown`, "server");

  let shutdownError: unknown;

  try {
    await closeServer();
  } catch (error) {
    shutdownError = error;
  }

  try {
    await getPool().end();
  } catch (error) {
    if (shutdownError) {
      logError(error, "server-shutdown");
    } else {
      shutdownError = error;
    }
  }

  if (shutdownError) {
    logError(shutdownError, "server-shutdown");
    process.exit(1);
  }

  log("graceful shutdown completed", "server");
  process.exit(0);
}

async function start(): Promise<void> {
  const createdTables = await ensureSchema(getPool());
  if (createdTables.length > 0) {
    log(`created tables: ${createdTables.join(", ")}`, "db");
  }

  const service = createReviewService({ repository: new PgGrammarRepository(getDb()) });
  const app = createApiApp({ service, readinessProbe: databaseReadinessProbe });
  app.set("env", process.env.NODE_ENV);

  const server = createServer(app);
  serverInstance = server;
  trackConnections(server);

  const port = getPort();
  server.listen(port, "0.0.0.0", () => {
    log(`serving on port ${port}`, "server");
  });
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}

start().catch((error: unknown) => {
  logError(error, "server-startup");
  process.exit(1);
});
