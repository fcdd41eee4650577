import path from "node:path";
import { logInfo } from "../lib/logging.js";
import type { PatchApplier } from "../pipeline/patch-applier.js";
import type { AutoFixer, DynamicTester, PatchGenerator, StageContext, StaticAnalyzer } from "../pipeline/stages.js";
import type { PatchRecord } from "../types.js";
import { extractIssueSnippets } from "./snippets.js";

export const AUTO_FIX_DIR_NAME = "auto_fix";

export type AutoFixIteration = {
  iteration: number;
  patches: PatchRecord[];
  failures: number;
};

export type AutoFixStopReason = "tests_passing" | "no_patches" | "max_iterations";

export type AutoFixReport = {
  success: boolean;
  baseline_failures: number;
  iterations: AutoFixIteration[];
  stopped_reason: AutoFixStopReason;
};

export interface IterativeAutoFixerDeps {
  analyzer: StaticAnalyzer;
  tester: DynamicTester;
  generator: PatchGenerator;
  applier: PatchApplier;
}

/**
 * analyze → generate → apply → re-test, until the checks pass, the generator
 * has nothing left to offer, or the iteration budget runs out.
 */
export class IterativeAutoFixer implements AutoFixer {
  constructor(private readonly deps: IterativeAutoFixerDeps) {}

  async fix(context: StageContext, maxIterations: number): Promise<AutoFixReport> {
    const countFailures = async (): Promise<number> =>
      (await this.deps.tester.runChecks(context)).filter((result) => result.status === "fail").length;

    const baselineFailures = await countFailures();
    const iterations: AutoFixIteration[] = [];

    if (baselineFailures === 0) {
      return { success: true, baseline_failures: 0, iterations, stopped_reason: "tests_passing" };
    }

    for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
      context.signal?.throwIfAborted();

      const report = await this.deps.analyzer.analyze(context);
      const snippets = await extractIssueSnippets(report, context.workingCopyDir, context.language);
      const outputDir = path.join(context.workspaceDir, AUTO_FIX_DIR_NAME, `iter_${String(iteration)}`);
      const generated = await this.deps.generator.generate({ context, report, snippets, outputDir, iteration });

      if (generated.length === 0) {
        return { success: false, baseline_failures: baselineFailures, iterations, stopped_reason: "no_patches" };
      }

      const patches = await this.deps.applier.applyAll(context.workingCopyDir, outputDir, context.signal);
      const failures = await countFailures();
      iterations.push({ iteration, patches, failures });

      logInfo("auto_fix.iteration", { workspaceId: context.workspaceId, iteration, failures });

      if (failures === 0) {
        return { success: true, baseline_failures: baselineFailures, iterations, stopped_reason: "tests_passing" };
      }
    }

    return { success: false, baseline_failures: baselineFailures, iterations, stopped_reason: "max_iterations" };
  }
}
