import { errorMessage, logError, logInfo, logWarn, serializeError } from "../lib/logging.js";
import type { JsonValue, PipelineResult, WorkspaceDescriptor, WorkspaceStatus } from "../types.js";
import type { WorkspaceRegistry } from "../workspace/registry.js";
import { stageContextFor, type AutoFixer, type StageContext, type Toolchain } from "./stages.js";
import type { StatusStore, TerminalStatus } from "./status-store.js";

export const DEFAULT_AUTO_FIX_MAX_ITERATIONS = 5;

// Summary line hidden from the user-facing dynamic report.
export const PATCHES_APPLIED_MARKER = "Patches applied:";

export function cleanDynamicReport(raw: string): string {
  return raw
    .split(/\r?\n/)
    .filter((line) => !line.trim().startsWith(PATCHES_APPLIED_MARKER))
    .join("\n");
}

export type StageName = "static" | "dynamic" | "auto_fix";

export interface PipelineRunnerDeps {
  toolchain: Toolchain;
  statusStore: Pick<StatusStore, "persist">;
  registry?: WorkspaceRegistry;
  autoFixMaxIterations?: number;
}

export class PipelineRunner {
  private readonly maxIterations: number;

  constructor(private readonly deps: PipelineRunnerDeps) {
    this.maxIterations = deps.autoFixMaxIterations ?? DEFAULT_AUTO_FIX_MAX_ITERATIONS;
  }

  /**
   * Runs static analysis, dynamic tests and auto-fix in that order. A failing
   * stage is folded into the result; only a failure outside the stages marks
   * the workspace as `error`.
   */
  async run(workspace: WorkspaceDescriptor, signal?: AbortSignal): Promise<TerminalStatus> {
    const context = stageContextFor(workspace, signal);
    const tools = this.deps.toolchain[workspace.language];
    const startedAt = Date.now();

    logInfo("pipeline.started", { workspaceId: workspace.id, language: workspace.language });

    try {
      signal?.throwIfAborted();
      const staticOutput = await this.captureText("static", context, () => tools.analyzer.analyze(context));

      signal?.throwIfAborted();
      const dynamicRaw = await this.captureText("dynamic", context, async () => (await tools.tester.test(context)).report);

      signal?.throwIfAborted();
      const autoFixReports = await this.runAutoFix(context, tools.fixer);
      signal?.throwIfAborted();

      const result: PipelineResult = {
        workspace: workspace.id,
        language: workspace.language,
        static: staticOutput,
        dynamic_raw: dynamicRaw,
        dynamic: cleanDynamicReport(dynamicRaw),
        auto_fix_reports: autoFixReports
      };

      const terminal: TerminalStatus = { status: "done", result };
      await this.deps.statusStore.persist(workspace.id, terminal);
      this.markStatus(workspace.id, "done");

      logInfo("pipeline.finished", { workspaceId: workspace.id, durationMs: Date.now() - startedAt });
      return terminal;
    } catch (error) {
      logError("pipeline.failed", {
        workspaceId: workspace.id,
        durationMs: Date.now() - startedAt,
        ...serializeError(error)
      });

      const terminal: TerminalStatus = { status: "error", error: errorMessage(error) };
      try {
        await this.deps.statusStore.persist(workspace.id, terminal);
      } catch (persistError) {
        logError("pipeline.persist_failed", {
          workspaceId: workspace.id,
          ...serializeError(persistError)
        });
      }
      this.markStatus(workspace.id, "error");
      return terminal;
    }
  }

  private async captureText(stage: StageName, context: StageContext, task: () => Promise<string>): Promise<string> {
    const startedAt = Date.now();

    try {
      const output = await task();
      logInfo("pipeline.stage_completed", {
        workspaceId: context.workspaceId,
        stage,
        durationMs: Date.now() - startedAt
      });
      return output;
    } catch (error) {
      logWarn("pipeline.stage_failed", {
        workspaceId: context.workspaceId,
        stage,
        ...serializeError(error)
      });
      return `[Error] ${errorMessage(error)}`;
    }
  }

  private async runAutoFix(context: StageContext, fixer: AutoFixer): Promise<JsonValue> {
    const startedAt = Date.now();

    try {
      const payload = await fixer.fix(context, this.maxIterations);
      logInfo("pipeline.stage_completed", {
        workspaceId: context.workspaceId,
        stage: "auto_fix",
        durationMs: Date.now() - startedAt
      });
      return payload;
    } catch (error) {
      logWarn("pipeline.stage_failed", {
        workspaceId: context.workspaceId,
        stage: "auto_fix",
        ...serializeError(error)
      });
      return { error: errorMessage(error) };
    }
  }

  private markStatus(workspaceId: string, status: WorkspaceStatus): void {
    const registry = this.deps.registry;
    if (registry && registry.get(workspaceId)) {
      registry.setStatus(workspaceId, status);
    }
  }
}
