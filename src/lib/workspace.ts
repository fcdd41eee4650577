import path from "node:path";
import type { Language } from "../types.js";

const WORKSPACE_ROOT_ENV = "MENDWORKS_WORKSPACE_ROOT";

export const SNAPSHOT_DIR_NAME = "uploaded_source";
export const PYTHON_WORKING_DIR_NAME = "python_repo";
export const CPP_PROJECT_DIR_NAME = "cpp_project";
// Downstream C++ tooling expects the project one level below cpp_project/.
export const CPP_PROJECT_SUBDIR_NAME = "puzzle-2";
export const PATCHES_DIR_NAME = "patches";
export const STATUS_FILE_NAME = "status.txt";
export const RESULT_FILE_NAME = "result.json";

export function resolveWorkspaceRoot(explicitRoot?: string, env: NodeJS.ProcessEnv = process.env): string {
  const rawExplicit = typeof explicitRoot === "string" ? explicitRoot.trim() : "";
  if (rawExplicit) {
    return path.resolve(rawExplicit);
  }

  const configured = String(env[WORKSPACE_ROOT_ENV] || "").trim();
  if (configured) {
    if (!path.isAbsolute(configured)) {
      throw new Error(`${WORKSPACE_ROOT_ENV} must be an absolute path. Received '${configured}'.`);
    }

    return path.resolve(configured);
  }

  return path.resolve(process.cwd(), "workspaces");
}

export interface WorkspaceLayout {
  workspaceDir: string;
  snapshotDir: string;
  workingCopyDir: string;
  patchesDir: string;
  statusFile: string;
  resultFile: string;
}

export function workingCopyPath(workspaceDir: string, language: Language): string {
  if (language === "py") {
    return path.join(workspaceDir, PYTHON_WORKING_DIR_NAME);
  }

  return path.join(workspaceDir, CPP_PROJECT_DIR_NAME, CPP_PROJECT_SUBDIR_NAME);
}

export function workspaceLayout(workspacesRoot: string, workspaceId: string, language: Language): WorkspaceLayout {
  const workspaceDir = path.join(workspacesRoot, workspaceId);

  return {
    workspaceDir,
    snapshotDir: path.join(workspaceDir, SNAPSHOT_DIR_NAME),
    workingCopyDir: workingCopyPath(workspaceDir, language),
    patchesDir: path.join(workspaceDir, PATCHES_DIR_NAME),
    statusFile: path.join(workspaceDir, STATUS_FILE_NAME),
    resultFile: path.join(workspaceDir, RESULT_FILE_NAME)
  };
}

const workspaceIdPattern = /^[A-Za-z0-9_-]{1,200}$/;

export function isWellFormedWorkspaceId(value: string): boolean {
  return workspaceIdPattern.test(value);
}
