import { randomUUID } from "node:crypto";
import cors from "cors";
import express from "express";
import multer from "multer";
import { ZodError, z } from "zod";
import { CommandRouter } from "./commands/command-router.js";
import { comparePatch } from "./commands/compare.js";
import { ArchiveIngestor } from "./ingest/archive-ingestor.js";
import type { AppConfig } from "./lib/config.js";
import { CompareError, HttpError, IngestError, QueueFullError, WorkspaceNotFoundError } from "./lib/errors.js";
import { logError, logInfo, serializeError } from "./lib/logging.js";
import { isWellFormedWorkspaceId } from "./lib/workspace.js";
import { PipelineRunner } from "./pipeline/pipeline-runner.js";
import type { Toolchain } from "./pipeline/stages.js";
import { StatusStore } from "./pipeline/status-store.js";
import { WorkerPool } from "./pipeline/worker-pool.js";
import { createDefaultToolchain } from "./tools/toolchain.js";
import type { WorkspaceDescriptor } from "./types.js";
import { WorkspaceRegistry } from "./workspace/registry.js";

const blankToUndefined = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const uploadFieldsSchema = z.object({
  file_type: z.preprocess(blankToUndefined, z.enum(["py", "cpp"]).optional())
});

const statusQuerySchema = z.object({
  ws: z.preprocess(blankToUndefined, z.string().max(200).optional())
});

const processBodySchema = z.object({
  command: z.preprocess(blankToUndefined, z.string().max(2_000).optional()),
  ws: z.preprocess(blankToUndefined, z.string().max(200).optional())
});

const compareBodySchema = z.object({
  file_path: z.preprocess(blankToUndefined, z.string().max(1_000).optional()),
  ws: z.preprocess(blankToUndefined, z.string().max(200).optional())
});

export interface AppServices {
  config: AppConfig;
  registry: WorkspaceRegistry;
  ingestor: ArchiveIngestor;
  statusStore: StatusStore;
  pool: WorkerPool;
  runner: PipelineRunner;
  router: CommandRouter;
}

export function createServices(config: AppConfig, overrides: { toolchain?: Toolchain; now?: () => Date } = {}): AppServices {
  const toolchain = overrides.toolchain ?? createDefaultToolchain(config.tools);
  const registry = new WorkspaceRegistry(config.workspacesRoot);
  const statusStore = new StatusStore(config.workspacesRoot);

  return {
    config,
    registry,
    statusStore,
    ingestor: new ArchiveIngestor({
      workspacesRoot: config.workspacesRoot,
      maxEntries: config.archive.maxEntries,
      maxUncompressedBytes: config.archive.maxUncompressedBytes,
      now: overrides.now
    }),
    pool: new WorkerPool({
      concurrency: config.pipeline.concurrency,
      queueLimit: config.pipeline.queueLimit
    }),
    runner: new PipelineRunner({
      toolchain,
      statusStore,
      registry,
      autoFixMaxIterations: config.pipeline.autoFixMaxIterations
    }),
    router: new CommandRouter({
      registry,
      toolchain,
      autoFixMaxIterations: config.pipeline.autoFixMaxIterations
    })
  };
}

type AppRequest = express.Request & {
  requestId?: string;
};

function getRequestId(req: express.Request): string {
  return (req as AppRequest).requestId || "unknown";
}

function errorBody(message: string): { status: "Error"; error: string } {
  return { status: "Error", error: message };
}

async function schedulePipeline(services: AppServices, workspace: WorkspaceDescriptor): Promise<void> {
  try {
    services.pool.submit({
      id: workspace.id,
      run: async (signal) => {
        await services.runner.run(workspace, signal);
      }
    });
  } catch (error) {
    if (error instanceof QueueFullError) {
      await services.statusStore.persist(workspace.id, { status: "error", error: error.message });
      services.registry.setStatus(workspace.id, "error");
      throw new HttpError(503, error.message);
    }
    throw error;
  }
}

export function createApp(services: AppServices): express.Express {
  const app = express();
  app.disable("x-powered-by");

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: services.config.archive.maxUploadBytes,
      files: 1
    }
  });

  app.use((req, res, next) => {
    const requestIdHeader = req.headers["x-request-id"];
    const requestId = typeof requestIdHeader === "string" && requestIdHeader ? requestIdHeader : randomUUID();
    const startedAt = Date.now();

    (req as AppRequest).requestId = requestId;
    res.setHeader("x-request-id", requestId);
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Referrer-Policy", "no-referrer");

    res.on("finish", () => {
      logInfo("http.request", {
        requestId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt
      });
    });

    next();
  });

  const allowedOrigins = services.config.corsAllowedOrigins;
  if (allowedOrigins.length > 0) {
    app.use(
      cors({
        origin(origin, callback) {
          if (!origin || allowedOrigins.includes(origin)) {
            callback(null, true);
            return;
          }

          callback(new HttpError(403, "Origin not allowed by CORS."));
        }
      })
    );
  }

  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: false, limit: "1mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true, queue: services.pool.stats() });
  });

  app.post("/upload", upload.single("file"), async (req, res, next) => {
    try {
      const file = req.file;
      if (!file) {
        res.status(400).json(errorBody("No file part"));
        return;
      }

      if (!file.originalname) {
        res.status(400).json(errorBody("No selected file"));
        return;
      }

      const fields = uploadFieldsSchema.parse(req.body ?? {});
      logInfo("upload.received", {
        requestId: getRequestId(req),
        filename: file.originalname,
        fileType: fields.file_type ?? null,
        bytes: file.size
      });

      if (!services.pool.canAccept()) {
        throw new HttpError(503, "Pipeline queue is full. Try again later.");
      }

      const workspace = services.registry.record(await services.ingestor.ingest(file.buffer, file.originalname, fields.file_type));
      await schedulePipeline(services, workspace);

      logInfo("upload.accepted", { requestId: getRequestId(req), workspaceId: workspace.id });
      res.status(202).json({ status: "Accepted", workspace: workspace.id });
    } catch (error) {
      next(error);
    }
  });

  app.get("/status", async (req, res, next) => {
    try {
      const { ws } = statusQuerySchema.parse(req.query);
      if (!ws) {
        res.status(400).json(errorBody("Missing workspace id (ws)"));
        return;
      }

      if (!isWellFormedWorkspaceId(ws)) {
        res.status(400).json(errorBody("Invalid workspace id (ws)"));
        return;
      }

      const readout = await services.statusStore.read(ws);
      switch (readout.status) {
        case "processing":
          res.json({ status: "Processing" });
          return;
        case "done":
          res.json({ status: "Done", result: readout.result });
          return;
        case "error":
          res.json(errorBody(readout.error));
          return;
        case "other":
          res.json({ status: readout.label });
          return;
      }
    } catch (error) {
      next(error);
    }
  });

  app.post("/process", async (req, res, next) => {
    try {
      const body = processBodySchema.parse(req.body ?? {});
      if (!body.command) {
        res.status(400).json(errorBody("No command entered."));
        return;
      }

      const outcome = await services.router.interpret(body.command, body.ws);
      if (outcome.status === "no_workspace") {
        res.status(400).json(errorBody(outcome.message));
        return;
      }

      res.json({ status: "Success", result: outcome.result });
    } catch (error) {
      next(error);
    }
  });

  app.post("/compare_patch", async (req, res, next) => {
    try {
      const body = compareBodySchema.parse(req.body ?? {});
      const workspace = await services.router.resolveWorkspace(body.ws);
      if (!workspace) {
        res.status(404).json(errorBody("No file uploaded for patch comparison."));
        return;
      }

      const diff = await comparePatch(workspace, body.file_path, services.config.tools.commandTimeoutMs);
      res.json({ status: "Success", diff });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = getRequestId(req);

    if (error instanceof ZodError) {
      logError("http.error.validation", {
        requestId,
        details: error.issues.map((issue) => issue.message)
      });
      return res.status(400).json({
        ...errorBody("Invalid request payload."),
        details: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }

    if (error instanceof IngestError) {
      return res.status(400).json({ ...errorBody(error.message), code: error.code });
    }

    if (error instanceof WorkspaceNotFoundError) {
      return res.status(404).json(errorBody(error.message));
    }

    if (error instanceof CompareError) {
      return res.status(404).json(errorBody(error.message));
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      return res.status(status).json(errorBody(`Upload rejected: ${error.message}`));
    }

    if (error instanceof HttpError) {
      logError("http.error", {
        requestId,
        statusCode: error.status,
        ...serializeError(error)
      });
      return res.status(error.status).json(errorBody(error.message));
    }

    logError("http.error.unhandled", {
      requestId,
      ...serializeError(error)
    });

    return res.status(500).json(errorBody("Internal server error."));
  });

  return app;
}
