import "dotenv/config";
import type { Server as HttpServer } from "node:http";
import { createApp, createServices } from "./app.js";
import { loadConfig } from "./lib/config.js";
import { ensureDir } from "./lib/fs-utils.js";
import { logError, logInfo, serializeError } from "./lib/logging.js";

const config = loadConfig();
const services = createServices(config);
const app = createApp(services);

let httpServer: HttpServer | null = null;
let shutdownPromise: Promise<void> | null = null;

async function main(): Promise<void> {
  await ensureDir(config.workspacesRoot);

  httpServer = await new Promise<HttpServer>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve(server));
    server.once("error", reject);
  });

  logInfo("server.started", {
    port: config.port,
    workspacesRoot: config.workspacesRoot,
    origins: config.corsAllowedOrigins,
    concurrency: config.pipeline.concurrency,
    queueLimit: config.pipeline.queueLimit
  });
  console.log(`mendworks running at http://localhost:${config.port}`);
}

function closeHttpServer(server: HttpServer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shutdownPromise) {
    await shutdownPromise;
    return;
  }

  shutdownPromise = (async () => {
    const startedAt = Date.now();

    logInfo("server.shutdown_started", {
      signal,
      graceMs: config.shutdownGraceMs
    });

    const forceExitTimer = setTimeout(() => {
      logError("server.shutdown_timeout", {
        signal,
        graceMs: config.shutdownGraceMs
      });
      process.exit(1);
    }, config.shutdownGraceMs);

    forceExitTimer.unref();

    try {
      if (httpServer) {
        httpServer.closeIdleConnections();
        await closeHttpServer(httpServer);
      }

      await services.pool.close();

      logInfo("server.shutdown_complete", {
        signal,
        durationMs: Date.now() - startedAt
      });
      process.exit(0);
    } catch (error) {
      logError("server.shutdown_failed", {
        signal,
        durationMs: Date.now() - startedAt,
        ...serializeError(error)
      });
      process.exit(1);
    } finally {
      clearTimeout(forceExitTimer);
    }
  })();

  await shutdownPromise;
}

process.once("SIGTERM", () => {
  void shutdown("SIGTERM");
});

process.once("SIGINT", () => {
  void shutdown("SIGINT");
});

main().catch((error) => {
  logError("server.start_failed", {
    ...serializeError(error)
  });
  process.exit(1);
});
