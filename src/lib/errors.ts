export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.details = details;
  }
}

export type IngestErrorCode =
  | "InvalidArchive"
  | "ArchiveTooLarge"
  | "PathTraversal"
  | "AmbiguousLanguage"
  | "NoRecognizedSource";

export class IngestError extends Error {
  readonly code: IngestErrorCode;

  constructor(code: IngestErrorCode, message: string) {
    super(message);
    this.name = "IngestError";
    this.code = code;
  }
}

export class WorkspaceNotFoundError extends Error {
  readonly workspaceId: string;

  constructor(workspaceId: string) {
    super("Workspace not found");
    this.name = "WorkspaceNotFoundError";
    this.workspaceId = workspaceId;
  }
}

export class CompareError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompareError";
  }
}

export class QueueFullError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`Pipeline queue is full (limit ${String(limit)}). Try again later.`);
    this.name = "QueueFullError";
    this.limit = limit;
  }
}
