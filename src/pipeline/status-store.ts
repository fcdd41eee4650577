import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { WorkspaceNotFoundError } from "../lib/errors.js";
import { hasErrorCode, pathExists, writeFileAtomic } from "../lib/fs-utils.js";
import { isWellFormedWorkspaceId, RESULT_FILE_NAME, STATUS_FILE_NAME } from "../lib/workspace.js";
import type { JsonValue, PipelineResult } from "../types.js";

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const pipelineResultSchema = z.object({
  workspace: z.string(),
  language: z.enum(["py", "cpp"]),
  static: z.string(),
  dynamic_raw: z.string(),
  dynamic: z.string(),
  auto_fix_reports: jsonValueSchema
});

const errorDocumentSchema = z.object({
  error: z.string()
});

export type TerminalStatus =
  | { status: "done"; result: PipelineResult }
  | { status: "error"; error: string };

export type StatusReadout =
  | { status: "processing" }
  | { status: "done"; result: PipelineResult }
  | { status: "error"; error: string }
  | { status: "other"; label: string };

/**
 * Per-workspace status marker plus result document. Both are written exactly
 * once, result first, each through a rename, so a reader that sees the final
 * marker always finds the complete result next to it.
 */
export class StatusStore {
  constructor(private readonly workspacesRoot: string) {}

  private workspaceDir(workspaceId: string): string {
    if (!isWellFormedWorkspaceId(workspaceId)) {
      throw new WorkspaceNotFoundError(workspaceId);
    }

    return path.join(this.workspacesRoot, workspaceId);
  }

  async persist(workspaceId: string, terminal: TerminalStatus): Promise<void> {
    const dir = this.workspaceDir(workspaceId);
    if (!(await pathExists(dir))) {
      throw new WorkspaceNotFoundError(workspaceId);
    }

    const statusFile = path.join(dir, STATUS_FILE_NAME);
    if (await pathExists(statusFile)) {
      throw new Error(`Status for workspace ${workspaceId} was already persisted.`);
    }

    const document = terminal.status === "done" ? terminal.result : { error: terminal.error };
    await writeFileAtomic(path.join(dir, RESULT_FILE_NAME), `${JSON.stringify(document, null, 2)}\n`);
    await writeFileAtomic(statusFile, terminal.status);
  }

  async read(workspaceId: string): Promise<StatusReadout> {
    const dir = this.workspaceDir(workspaceId);
    if (!(await pathExists(dir))) {
      throw new WorkspaceNotFoundError(workspaceId);
    }

    const marker = await readOptionalText(path.join(dir, STATUS_FILE_NAME));
    if (marker === null) {
      return { status: "processing" };
    }

    const label = marker.trim();
    const resultText = await readOptionalText(path.join(dir, RESULT_FILE_NAME));

    if (label === "done" && resultText !== null) {
      const parsed = pipelineResultSchema.safeParse(safeJsonParse(resultText));
      if (parsed.success) {
        return { status: "done", result: parsed.data };
      }
    }

    if (label === "error") {
      const parsed = errorDocumentSchema.safeParse(resultText === null ? null : safeJsonParse(resultText));
      return { status: "error", error: parsed.success ? parsed.data.error : "Pipeline failed." };
    }

    return { status: "other", label };
  }
}

async function readOptionalText(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

function safeJsonParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
