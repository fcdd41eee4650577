import type { PatchApplier } from "../pipeline/patch-applier.js";
import type { DynamicTester, DynamicTestRun, StageContext } from "../pipeline/stages.js";
import type { TestResult } from "../types.js";
import type { CheckSuite } from "./check-suites.js";
import { buildDynamicReport } from "./dynamic-report.js";

export class SuiteDynamicTester implements DynamicTester {
  constructor(
    private readonly applier: PatchApplier,
    private readonly suite: CheckSuite,
    private readonly now: () => Date = () => new Date()
  ) {}

  async test(context: StageContext): Promise<DynamicTestRun> {
    const patches = await this.applier.applyAll(context.workingCopyDir, context.patchesDir, context.signal);
    const results = await this.runChecks(context);

    return {
      report: buildDynamicReport({ date: this.now(), patches, results }),
      results,
      patches
    };
  }

  runChecks(context: StageContext): Promise<TestResult[]> {
    return this.suite.run(context);
  }
}
