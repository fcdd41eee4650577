export type Language = "py" | "cpp";

export type WorkspaceStatus = "processing" | "done" | "error";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type SourceFileIndex = Record<Language, string[]>;

export interface WorkspaceDescriptor {
  id: string;
  language: Language;
  workspaceDir: string;
  snapshotDir: string;
  workingCopyDir: string;
  sourceFiles: SourceFileIndex;
  status: WorkspaceStatus;
  createdAt: string;
}

export type PatchRecord = {
  name: string;
  status: "success" | "failed";
  detail: string;
};

export type TestResult = {
  test: string;
  status: "pass" | "fail" | "skipped";
  detail: string;
};

export type PipelineResult = {
  workspace: string;
  language: Language;
  static: string;
  dynamic_raw: string;
  dynamic: string;
  auto_fix_reports: JsonValue;
};
