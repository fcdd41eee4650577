import path from "node:path";
import { PATCHES_DIR_NAME } from "../lib/workspace.js";
import type { JsonValue, Language, PatchRecord, TestResult, WorkspaceDescriptor } from "../types.js";

export interface StageContext {
  workspaceId: string;
  language: Language;
  workspaceDir: string;
  workingCopyDir: string;
  patchesDir: string;
  signal?: AbortSignal;
}

export interface StaticAnalyzer {
  analyze(context: StageContext): Promise<string>;
}

export interface DynamicTestRun {
  report: string;
  results: TestResult[];
  patches: PatchRecord[];
}

export interface DynamicTester {
  /** Applies pending patches, runs the checks and renders the raw report. */
  test(context: StageContext): Promise<DynamicTestRun>;
  /** Runs the checks only. */
  runChecks(context: StageContext): Promise<TestResult[]>;
}

export interface AutoFixer {
  fix(context: StageContext, maxIterations: number): Promise<JsonValue>;
}

export interface PatchGenerationInput {
  context: StageContext;
  report: string;
  snippets: string;
  outputDir: string;
  iteration: number;
}

export interface PatchGenerator {
  /** Writes `patch_*.diff` files into outputDir and returns their names. */
  generate(input: PatchGenerationInput): Promise<string[]>;
}

export interface LanguageToolchain {
  analyzer: StaticAnalyzer;
  tester: DynamicTester;
  fixer: AutoFixer;
  generator: PatchGenerator;
}

export type Toolchain = Record<Language, LanguageToolchain>;

export function stageContextFor(workspace: WorkspaceDescriptor, signal?: AbortSignal): StageContext {
  return {
    workspaceId: workspace.id,
    language: workspace.language,
    workspaceDir: workspace.workspaceDir,
    workingCopyDir: workspace.workingCopyDir,
    patchesDir: path.join(workspace.workspaceDir, PATCHES_DIR_NAME),
    signal
  };
}
