import type { PatchGenerator, StageContext, StaticAnalyzer } from "../pipeline/stages.js";
import { extractIssueSnippets } from "./snippets.js";

/**
 * Analyzes the working copy and asks the generator for patches in the
 * workspace's `patches/` directory, where the dynamic tester picks them up.
 */
export async function generateWorkspacePatches(
  context: StageContext,
  deps: { analyzer: StaticAnalyzer; generator: PatchGenerator }
): Promise<string[]> {
  const report = await deps.analyzer.analyze(context);
  const snippets = await extractIssueSnippets(report, context.workingCopyDir, context.language);

  return deps.generator.generate({
    context,
    report,
    snippets,
    outputDir: context.patchesDir,
    iteration: 0
  });
}
