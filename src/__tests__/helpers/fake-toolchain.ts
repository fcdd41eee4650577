import type {
  DynamicTestRun,
  LanguageToolchain,
  PatchGenerationInput,
  StageContext,
  Toolchain
} from "../../pipeline/stages.js";
import type { JsonValue, TestResult } from "../../types.js";

export const FAKE_DYNAMIC_REPORT = [
  "# Dynamic Analysis Report",
  "Date: 2024-01-05",
  "",
  "== TEST EXECUTION ==",
  "[+] smoke ... PASS",
  "",
  "== SUMMARY ==",
  "Patches applied: 0/0",
  "Bugs fixed: 1",
  "Remaining issues: 0",
  "New issues: 0"
].join("\n");

export interface FakeStageBehavior {
  analyze?: (context: StageContext) => Promise<string>;
  test?: (context: StageContext) => Promise<DynamicTestRun>;
  fix?: (context: StageContext, maxIterations: number) => Promise<JsonValue>;
  generate?: (input: PatchGenerationInput) => Promise<string[]>;
}

export interface FakeToolchain {
  toolchain: Toolchain;
  /** `stage:language:workspaceId` for every stage invocation, in order. */
  calls: string[];
}

const passingResults: TestResult[] = [{ test: "smoke", status: "pass", detail: "" }];

export function createFakeToolchain(behavior: FakeStageBehavior = {}): FakeToolchain {
  const calls: string[] = [];
  const record = (stage: string, context: StageContext) => {
    calls.push(`${stage}:${context.language}:${context.workspaceId}`);
  };

  const build = (): LanguageToolchain => ({
    analyzer: {
      async analyze(context) {
        record("static", context);
        return behavior.analyze ? behavior.analyze(context) : `static report for ${context.language}`;
      }
    },
    tester: {
      async test(context) {
        record("dynamic", context);
        return behavior.test
          ? behavior.test(context)
          : { report: FAKE_DYNAMIC_REPORT, results: passingResults, patches: [] };
      },
      async runChecks(context) {
        record("checks", context);
        return passingResults;
      }
    },
    fixer: {
      async fix(context, maxIterations) {
        record("auto_fix", context);
        return behavior.fix
          ? behavior.fix(context, maxIterations)
          : { success: true, baseline_failures: 0, iterations: [], stopped_reason: "tests_passing" };
      }
    },
    generator: {
      async generate(input) {
        record("generate", input.context);
        return behavior.generate ? behavior.generate(input) : [];
      }
    }
  });

  return {
    toolchain: { py: build(), cpp: build() },
    calls
  };
}
