import { WorkspaceNotFoundError } from "../lib/errors.js";
import { isWellFormedWorkspaceId } from "../lib/workspace.js";
import type { WorkspaceDescriptor, WorkspaceStatus } from "../types.js";
import { loadWorkspaceFromDisk } from "./source-index.js";

/**
 * In-memory workspace metadata keyed by id.
 *
 * Every read-modify-write below runs synchronously, so the event loop never
 * interleaves a background pipeline update with a foreground command halfway
 * through. Reads hand out deep copies; callers never hold a live record.
 */
export class WorkspaceRegistry {
  private readonly entries = new Map<string, WorkspaceDescriptor>();
  private latestId: string | null = null;

  constructor(private readonly workspacesRoot?: string) {}

  record(descriptor: WorkspaceDescriptor): WorkspaceDescriptor {
    const stored = structuredClone(descriptor);
    this.entries.set(stored.id, stored);
    this.latestId = stored.id;
    return structuredClone(stored);
  }

  get(workspaceId: string): WorkspaceDescriptor | undefined {
    const entry = this.entries.get(workspaceId);
    return entry ? structuredClone(entry) : undefined;
  }

  latest(): WorkspaceDescriptor | undefined {
    return this.latestId ? this.get(this.latestId) : undefined;
  }

  list(): WorkspaceDescriptor[] {
    return Array.from(this.entries.values(), (entry) => structuredClone(entry));
  }

  setStatus(workspaceId: string, status: WorkspaceStatus): WorkspaceDescriptor {
    const entry = this.entries.get(workspaceId);
    if (!entry) {
      throw new WorkspaceNotFoundError(workspaceId);
    }

    entry.status = status;
    return structuredClone(entry);
  }

  /**
   * Looks the workspace up in memory first, then on disk. Disk hits are cached
   * without becoming the latest workspace.
   */
  async resolve(workspaceId: string): Promise<WorkspaceDescriptor | undefined> {
    const cached = this.get(workspaceId);
    if (cached) {
      return cached;
    }

    if (!this.workspacesRoot || !isWellFormedWorkspaceId(workspaceId)) {
      return undefined;
    }

    const loaded = await loadWorkspaceFromDisk(this.workspacesRoot, workspaceId);
    if (!loaded) {
      return undefined;
    }

    if (!this.entries.has(workspaceId)) {
      this.entries.set(workspaceId, structuredClone(loaded));
    }

    return this.get(workspaceId);
  }
}
