import { promises as fs } from "node:fs";
import path from "node:path";
import { ensureDir, hasErrorCode } from "../lib/fs-utils.js";

const MAX_ID_ATTEMPTS = 10_000;

export function sanitizeBaseName(filename: string): string {
  const base = path.basename(filename.replaceAll("\\", "/"));
  const extension = path.extname(base);
  const stem = extension ? base.slice(0, -extension.length) : base;
  const sanitized = stem.replace(/[^A-Za-z0-9_-]/g, "_");
  return sanitized || "upload";
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function candidateWorkspaceId(baseName: string, timestamp: string, attempt: number): string {
  return attempt === 0 ? `${baseName}_${timestamp}` : `${baseName}_${timestamp}_${String(attempt)}`;
}

/**
 * Claims a fresh workspace directory. `mkdir` without `recursive` fails with
 * EEXIST when the id is taken, which makes the claim atomic across
 * concurrent uploads.
 */
export async function allocateWorkspaceDir(
  workspacesRoot: string,
  filename: string,
  now: Date
): Promise<{ id: string; workspaceDir: string }> {
  await ensureDir(workspacesRoot);
  const baseName = sanitizeBaseName(filename);
  const timestamp = formatTimestamp(now);

  for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt += 1) {
    const id = candidateWorkspaceId(baseName, timestamp, attempt);
    const workspaceDir = path.join(workspacesRoot, id);

    try {
      await fs.mkdir(workspaceDir);
      return { id, workspaceDir };
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        continue;
      }
      throw error;
    }
  }

  throw new Error(`Could not allocate a workspace id for '${baseName}_${timestamp}'.`);
}
