import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import JSZip from "jszip";
import { IngestError } from "../lib/errors.js";
import { copyTree, ensureDir } from "../lib/fs-utils.js";
import { logInfo, logWarn } from "../lib/logging.js";
import { workspaceLayout } from "../lib/workspace.js";
import type { Language, WorkspaceDescriptor } from "../types.js";
import { indexSourceFiles } from "../workspace/source-index.js";
import { allocateWorkspaceDir } from "../workspace/workspace-id.js";
import { classifyLanguage } from "./language.js";

export const DEFAULT_MAX_ARCHIVE_ENTRIES = 2000;
export const DEFAULT_MAX_ARCHIVE_BYTES = 200 * 1024 * 1024;

export interface ArchiveIngestorOptions {
  workspacesRoot: string;
  maxEntries?: number;
  maxUncompressedBytes?: number;
  tempRoot?: string;
  now?: () => Date;
}

interface ArchiveMember {
  rawName: string;
  targetPath: string;
  entry: JSZip.JSZipObject;
}

export function isUnsafeMemberName(rawName: string, extractRoot: string): boolean {
  const normalized = rawName.replaceAll("\\", "/");

  if (!normalized || normalized.includes("\0")) {
    return true;
  }

  if (normalized.startsWith("/") || /^[A-Za-z]:/.test(normalized)) {
    return true;
  }

  if (normalized.split("/").some((segment) => segment === "..")) {
    return true;
  }

  const root = path.resolve(extractRoot);
  const target = path.resolve(root, normalized);
  return target !== root && !target.startsWith(`${root}${path.sep}`);
}

async function loadArchive(bytes: Uint8Array): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(bytes);
  } catch {
    throw new IngestError("InvalidArchive", "The uploaded file is not a valid ZIP file.");
  }
}

/** Checks every member name and the member count before anything is written. */
function planMembers(zip: JSZip, extractRoot: string, maxEntries: number): ArchiveMember[] {
  const entries = Object.values(zip.files);

  if (entries.length > maxEntries) {
    throw new IngestError(
      "ArchiveTooLarge",
      `Unsafe archive: ${String(entries.length)} members exceed the limit of ${String(maxEntries)}.`
    );
  }

  const members: ArchiveMember[] = [];
  for (const entry of entries) {
    const rawName = entry.unsafeOriginalName ?? entry.name;

    if (isUnsafeMemberName(rawName, extractRoot)) {
      throw new IngestError("PathTraversal", `Unsafe archive: member '${rawName}' escapes the extraction directory.`);
    }

    members.push({
      rawName,
      targetPath: path.resolve(extractRoot, rawName.replaceAll("\\", "/")),
      entry
    });
  }

  return members;
}

function readMemberWithinBudget(member: ArchiveMember, budget: { remaining: number; limit: number }): Promise<Buffer> {
  const stream = member.entry.nodeStream("nodebuffer");
  const chunks: Buffer[] = [];

  return new Promise((resolve, reject) => {
    const stop = (error: Error) => {
      stream.removeAllListeners("data");
      stream.pause();
      reject(error);
    };

    stream.on("data", (chunk: Buffer | string) => {
      const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
      budget.remaining -= buffer.length;

      if (budget.remaining < 0) {
        stop(
          new IngestError(
            "ArchiveTooLarge",
            `Unsafe archive: uncompressed size exceeds the limit of ${String(budget.limit)} bytes.`
          )
        );
        return;
      }

      chunks.push(buffer);
    });
    stream.on("error", (error: Error) => {
      stop(error);
    });
    stream.on("end", () => {
      resolve(Buffer.concat(chunks));
    });
  });
}

async function extractMembers(members: ArchiveMember[], extractRoot: string, maxBytes: number): Promise<void> {
  const budget = { remaining: maxBytes, limit: maxBytes };
  await ensureDir(extractRoot);

  for (const member of members) {
    if (member.entry.dir) {
      await ensureDir(member.targetPath);
      continue;
    }

    // the whole member is decompressed and counted before its file exists
    const content = await readMemberWithinBudget(member, budget);
    await ensureDir(path.dirname(member.targetPath));
    await fs.writeFile(member.targetPath, content);
  }
}

export class ArchiveIngestor {
  private readonly maxEntries: number;
  private readonly maxUncompressedBytes: number;
  private readonly now: () => Date;

  constructor(private readonly options: ArchiveIngestorOptions) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ARCHIVE_ENTRIES;
    this.maxUncompressedBytes = options.maxUncompressedBytes ?? DEFAULT_MAX_ARCHIVE_BYTES;
    this.now = options.now ?? (() => new Date());
  }

  async ingest(bytes: Uint8Array, filename: string, languageHint?: Language): Promise<WorkspaceDescriptor> {
    const tempDir = await fs.mkdtemp(path.join(this.options.tempRoot ?? os.tmpdir(), "mendworks-extract-"));
    const extractRoot = path.join(tempDir, "tree");

    try {
      const zip = await loadArchive(bytes);
      const members = planMembers(zip, extractRoot, this.maxEntries);
      await extractMembers(members, extractRoot, this.maxUncompressedBytes);

      const extractedSources = await indexSourceFiles(extractRoot);
      const language = classifyLanguage(extractedSources, languageHint);
      return await this.materialize(extractRoot, filename, language);
    } catch (error) {
      if (error instanceof IngestError) {
        logWarn("ingest.rejected", { filename, code: error.code, message: error.message });
      }
      throw error;
    } finally {
      await fs.rm(tempDir, { recursive: true, force: true });
    }
  }

  private async materialize(extractRoot: string, filename: string, language: Language): Promise<WorkspaceDescriptor> {
    const createdAt = this.now();
    const { id, workspaceDir } = await allocateWorkspaceDir(this.options.workspacesRoot, filename, createdAt);
    const layout = workspaceLayout(this.options.workspacesRoot, id, language);

    try {
      await copyTree(extractRoot, layout.snapshotDir);
      await copyTree(layout.snapshotDir, layout.workingCopyDir);

      const descriptor: WorkspaceDescriptor = {
        id,
        language,
        workspaceDir,
        snapshotDir: layout.snapshotDir,
        workingCopyDir: layout.workingCopyDir,
        sourceFiles: await indexSourceFiles(layout.snapshotDir),
        status: "processing",
        createdAt: createdAt.toISOString()
      };

      logInfo("ingest.workspace_created", {
        workspaceId: id,
        language,
        pythonFiles: descriptor.sourceFiles.py.length,
        cppFiles: descriptor.sourceFiles.cpp.length
      });

      return descriptor;
    } catch (error) {
      await fs.rm(workspaceDir, { recursive: true, force: true });
      throw error;
    }
  }
}
