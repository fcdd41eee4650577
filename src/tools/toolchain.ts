import type { AppConfig } from "../lib/config.js";
import { GitApplyTool, PatchApplier } from "../pipeline/patch-applier.js";
import type { LanguageToolchain, PatchGenerator, StaticAnalyzer, Toolchain } from "../pipeline/stages.js";
import { IterativeAutoFixer } from "./auto-fixer.js";
import { CppCheckSuite, PythonCheckSuite, type CheckSuite } from "./check-suites.js";
import { SuiteDynamicTester } from "./dynamic-tester.js";
import { CommandPatchGenerator } from "./patch-generator.js";
import { CppStaticAnalyzer, PythonStaticAnalyzer } from "./static-analyzers.js";

function assemble(
  analyzer: StaticAnalyzer,
  suite: CheckSuite,
  generator: PatchGenerator,
  applier: PatchApplier
): LanguageToolchain {
  const tester = new SuiteDynamicTester(applier, suite);

  return {
    analyzer,
    tester,
    generator,
    fixer: new IterativeAutoFixer({ analyzer, tester, generator, applier })
  };
}

export function createPatchApplier(tools: AppConfig["tools"]): PatchApplier {
  return new PatchApplier(new GitApplyTool(tools.commandTimeoutMs));
}

export function createDefaultToolchain(tools: AppConfig["tools"], applier = createPatchApplier(tools)): Toolchain {
  const generator = new CommandPatchGenerator({
    command: tools.patchGeneratorCommand,
    timeoutMs: tools.commandTimeoutMs
  });

  return {
    py: assemble(
      new PythonStaticAnalyzer({ pythonBin: tools.pythonBin, timeoutMs: tools.commandTimeoutMs }),
      new PythonCheckSuite({
        pythonBin: tools.pythonBin,
        timeoutMs: tools.commandTimeoutMs,
        customTestCommand: tools.pythonTestCommand
      }),
      generator,
      applier
    ),
    cpp: assemble(
      new CppStaticAnalyzer({ timeoutMs: tools.commandTimeoutMs }),
      new CppCheckSuite({ timeoutMs: tools.commandTimeoutMs, qtBehavior: tools.cppQtBehavior }),
      generator,
      applier
    )
  };
}
