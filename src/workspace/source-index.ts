import { promises as fs } from "node:fs";
import path from "node:path";
import { listFilesRecursive, pathExists } from "../lib/fs-utils.js";
import {
  CPP_PROJECT_DIR_NAME,
  PYTHON_WORKING_DIR_NAME,
  RESULT_FILE_NAME,
  SNAPSHOT_DIR_NAME,
  STATUS_FILE_NAME,
  workingCopyPath
} from "../lib/workspace.js";
import type { Language, SourceFileIndex, WorkspaceDescriptor, WorkspaceStatus } from "../types.js";

const extensionByLanguage: Record<Language, string> = {
  py: ".py",
  cpp: ".cpp"
};

export function indexSourcePaths(relativePaths: string[]): SourceFileIndex {
  const index: SourceFileIndex = { py: [], cpp: [] };

  for (const relativePath of relativePaths) {
    const extension = path.posix.extname(relativePath).toLowerCase();
    if (extension === extensionByLanguage.py) {
      index.py.push(relativePath);
    } else if (extension === extensionByLanguage.cpp) {
      index.cpp.push(relativePath);
    }
  }

  return index;
}

export async function indexSourceFiles(rootDir: string): Promise<SourceFileIndex> {
  return indexSourcePaths(await listFilesRecursive(rootDir));
}

/**
 * Rebuilds a descriptor for a workspace directory that is not in memory,
 * e.g. one created before the process restarted.
 */
export async function loadWorkspaceFromDisk(
  workspacesRoot: string,
  workspaceId: string
): Promise<WorkspaceDescriptor | undefined> {
  const workspaceDir = path.join(workspacesRoot, workspaceId);
  const snapshotDir = path.join(workspaceDir, SNAPSHOT_DIR_NAME);

  if (!(await pathExists(snapshotDir))) {
    return undefined;
  }

  let language: Language;
  if (await pathExists(path.join(workspaceDir, PYTHON_WORKING_DIR_NAME))) {
    language = "py";
  } else if (await pathExists(path.join(workspaceDir, CPP_PROJECT_DIR_NAME))) {
    language = "cpp";
  } else {
    return undefined;
  }

  let status: WorkspaceStatus = "processing";
  const statusFile = path.join(workspaceDir, STATUS_FILE_NAME);
  if (await pathExists(statusFile)) {
    const marker = (await fs.readFile(statusFile, "utf8")).trim();
    if (marker === "done" && (await pathExists(path.join(workspaceDir, RESULT_FILE_NAME)))) {
      status = "done";
    } else if (marker === "error") {
      status = "error";
    }
  }

  const stats = await fs.stat(workspaceDir);

  return {
    id: workspaceId,
    language,
    workspaceDir,
    snapshotDir,
    workingCopyDir: workingCopyPath(workspaceDir, language),
    sourceFiles: await indexSourceFiles(snapshotDir),
    status,
    createdAt: stats.birthtime.toISOString()
  };
}
