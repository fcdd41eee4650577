import path from "node:path";
import { ensureDir, writeFileAtomic } from "../lib/fs-utils.js";
import { logInfo } from "../lib/logging.js";
import { runCommand } from "../lib/process-runner.js";
import { discoverPatchFiles } from "../pipeline/patch-applier.js";
import type { PatchGenerationInput, PatchGenerator } from "../pipeline/stages.js";

export const REPORT_FILE_NAME = "analysis_report.txt";
export const SNIPPETS_FILE_NAME = "issue_snippets.txt";

/**
 * Delegates patch authoring to an operator-supplied shell command. The
 * command reads the report and snippets named in its environment and writes
 * `patch_*.diff` files into MENDWORKS_PATCH_DIR. Without a command nothing is
 * generated.
 */
export class CommandPatchGenerator implements PatchGenerator {
  constructor(private readonly options: { command?: string; timeoutMs: number }) {}

  async generate(input: PatchGenerationInput): Promise<string[]> {
    await ensureDir(input.outputDir);

    const reportFile = path.join(input.outputDir, REPORT_FILE_NAME);
    const snippetsFile = path.join(input.outputDir, SNIPPETS_FILE_NAME);
    await writeFileAtomic(reportFile, input.report);
    await writeFileAtomic(snippetsFile, input.snippets);

    if (!this.options.command) {
      logInfo("patch_generator.not_configured", { workspaceId: input.context.workspaceId });
      return [];
    }

    const result = await runCommand({
      cwd: input.context.workingCopyDir,
      command: this.options.command,
      shell: true,
      timeoutMs: this.options.timeoutMs,
      signal: input.context.signal,
      env: {
        MENDWORKS_REPORT_FILE: reportFile,
        MENDWORKS_SNIPPETS_FILE: snippetsFile,
        MENDWORKS_PATCH_DIR: input.outputDir,
        MENDWORKS_REPO_DIR: input.context.workingCopyDir,
        MENDWORKS_LANGUAGE: input.context.language,
        MENDWORKS_ITERATION: String(input.iteration)
      }
    });

    if (!result.ok) {
      const reason = result.combined.split(/\r?\n/).find((line) => line.trim()) ?? `exit code ${String(result.exitCode)}`;
      throw new Error(`Patch generator failed: ${reason.trim()}`);
    }

    const generated = await discoverPatchFiles(input.outputDir);
    logInfo("patch_generator.completed", {
      workspaceId: input.context.workspaceId,
      iteration: input.iteration,
      patches: generated.length
    });
    return generated;
  }
}
