import path from "node:path";
import { listFilesRecursive, pathExists } from "../lib/fs-utils.js";
import type { StageContext, StaticAnalyzer } from "../pipeline/stages.js";
import { captureCommandOutput } from "./command-output.js";

export interface AnalyzerOptions {
  timeoutMs: number;
}

export interface PythonAnalyzerOptions extends AnalyzerOptions {
  pythonBin: string;
}

/** pylint (errors only), flake8 (syntax and undefined names) and bandit. */
export class PythonStaticAnalyzer implements StaticAnalyzer {
  constructor(private readonly options: PythonAnalyzerOptions) {}

  async analyze(context: StageContext): Promise<string> {
    const run = (args: string[]) =>
      captureCommandOutput({
        cwd: context.workingCopyDir,
        command: this.options.pythonBin,
        args: ["-m", ...args],
        timeoutMs: this.options.timeoutMs,
        signal: context.signal
      });

    const pylint = await run(["pylint", "--disable=R,C,W,E1101", "--score=n", "--exit-zero", "--recursive=y", "."]);
    const flake8 = await run(["flake8", "--select=E9,F63,F7,F82", "--show-source", "--statistics", "."]);
    const bandit = await run(["bandit", "-r", "."]);

    return [pylint, flake8, bandit].join("\n");
  }
}

/** cppcheck, plus clang-tidy when a compilation database is present. */
export class CppStaticAnalyzer implements StaticAnalyzer {
  constructor(private readonly options: AnalyzerOptions) {}

  async analyze(context: StageContext): Promise<string> {
    const cppcheck = await captureCommandOutput({
      cwd: context.workingCopyDir,
      command: "cppcheck",
      args: ["--enable=warning,performance,portability", "--inconclusive", "--quiet", "--force", "."],
      timeoutMs: this.options.timeoutMs,
      signal: context.signal
    });

    let clangTidy = "";
    if (await pathExists(path.join(context.workingCopyDir, "compile_commands.json"))) {
      const sources = (await listFilesRecursive(context.workingCopyDir)).filter((file) => file.endsWith(".cpp"));
      if (sources.length > 0) {
        clangTidy = await captureCommandOutput({
          cwd: context.workingCopyDir,
          command: "clang-tidy",
          args: [...sources, "--", "-std=c++17"],
          timeoutMs: this.options.timeoutMs,
          signal: context.signal
        });
      }
    }

    return `${cppcheck}\n${clangTidy}`;
  }
}
