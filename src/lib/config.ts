import { z } from "zod";
import { resolveWorkspaceRoot } from "./workspace.js";

const positiveInt = (fallback: number, min = 1) => z.coerce.number().int().min(min).default(fallback);

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = (value || "").trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  PORT: positiveInt(3000),
  MENDWORKS_WORKSPACE_ROOT: optionalText,
  MENDWORKS_MAX_ARCHIVE_ENTRIES: positiveInt(2000),
  MENDWORKS_MAX_ARCHIVE_BYTES: positiveInt(200 * 1024 * 1024),
  MENDWORKS_MAX_UPLOAD_BYTES: positiveInt(50 * 1024 * 1024),
  MENDWORKS_PIPELINE_CONCURRENCY: positiveInt(2),
  MENDWORKS_PIPELINE_QUEUE_LIMIT: positiveInt(16, 0),
  MENDWORKS_COMMAND_TIMEOUT_MS: positiveInt(300_000, 1_000),
  MENDWORKS_AUTO_FIX_MAX_ITERATIONS: positiveInt(5),
  MENDWORKS_PYTHON_BIN: z.string().trim().min(1).default("python3"),
  MENDWORKS_PATCH_GENERATOR_COMMAND: optionalText,
  PY_DYNAMIC_TEST_CMD: optionalText,
  CPP_QT_BEHAVIOR: z.enum(["auto", "skip", "force"]).catch("skip"),
  CORS_ALLOWED_ORIGINS: optionalText,
  SHUTDOWN_GRACE_MS: positiveInt(15_000, 1_000)
});

export type CppQtBehavior = "auto" | "skip" | "force";

export interface AppConfig {
  port: number;
  workspacesRoot: string;
  archive: {
    maxEntries: number;
    maxUncompressedBytes: number;
    maxUploadBytes: number;
  };
  pipeline: {
    concurrency: number;
    queueLimit: number;
    autoFixMaxIterations: number;
  };
  tools: {
    commandTimeoutMs: number;
    pythonBin: string;
    patchGeneratorCommand?: string;
    pythonTestCommand?: string;
    cppQtBehavior: CppQtBehavior;
  };
  corsAllowedOrigins: string[];
  shutdownGraceMs: number;
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = typeof value === "string" && value.trim() === "" ? undefined : value;
  }
  return cleaned;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(blankToUndefined(env));

  return {
    port: parsed.PORT,
    workspacesRoot: resolveWorkspaceRoot(undefined, { MENDWORKS_WORKSPACE_ROOT: parsed.MENDWORKS_WORKSPACE_ROOT }),
    archive: {
      maxEntries: parsed.MENDWORKS_MAX_ARCHIVE_ENTRIES,
      maxUncompressedBytes: parsed.MENDWORKS_MAX_ARCHIVE_BYTES,
      maxUploadBytes: parsed.MENDWORKS_MAX_UPLOAD_BYTES
    },
    pipeline: {
      concurrency: parsed.MENDWORKS_PIPELINE_CONCURRENCY,
      queueLimit: parsed.MENDWORKS_PIPELINE_QUEUE_LIMIT,
      autoFixMaxIterations: parsed.MENDWORKS_AUTO_FIX_MAX_ITERATIONS
    },
    tools: {
      commandTimeoutMs: parsed.MENDWORKS_COMMAND_TIMEOUT_MS,
      pythonBin: parsed.MENDWORKS_PYTHON_BIN,
      patchGeneratorCommand: parsed.MENDWORKS_PATCH_GENERATOR_COMMAND,
      pythonTestCommand: parsed.PY_DYNAMIC_TEST_CMD,
      cppQtBehavior: parsed.CPP_QT_BEHAVIOR
    },
    corsAllowedOrigins: (parsed.CORS_ALLOWED_ORIGINS || "")
      .split(",")
      .map((entry) => entry.trim())
      .filter(Boolean),
    shutdownGraceMs: parsed.SHUTDOWN_GRACE_MS
  };
}
