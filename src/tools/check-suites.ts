import { promises as fs } from "node:fs";
import path from "node:path";
import type { CppQtBehavior } from "../lib/config.js";
import { listFilesRecursive, pathExists } from "../lib/fs-utils.js";
import { errorMessage } from "../lib/logging.js";
import { runCommand, type CommandResult, type RunCommandInput } from "../lib/process-runner.js";
import type { StageContext } from "../pipeline/stages.js";
import type { TestResult } from "../types.js";

export interface CheckSuite {
  run(context: StageContext): Promise<TestResult[]>;
}

const MAX_SMOKE_MODULES = 5;
const PYTEST_DIR_CANDIDATES = ["tests", "test", "testing"];
const PYTEST_CONFIG_FILES = ["pytest.ini", "conftest.py", "pyproject.toml", "setup.cfg"];

async function runOrDescribe(input: RunCommandInput): Promise<CommandResult> {
  try {
    return await runCommand(input);
  } catch (error) {
    return {
      ok: false,
      exitCode: 127,
      stdout: "",
      stderr: errorMessage(error),
      combined: errorMessage(error),
      timedOut: false,
      aborted: false
    };
  }
}

export interface PythonCheckOptions {
  pythonBin: string;
  timeoutMs: number;
  customTestCommand?: string;
}

export class PythonCheckSuite implements CheckSuite {
  constructor(private readonly options: PythonCheckOptions) {}

  async run(context: StageContext): Promise<TestResult[]> {
    if (this.options.customTestCommand) {
      const result = await runOrDescribe({
        cwd: context.workingCopyDir,
        command: this.options.customTestCommand,
        shell: true,
        timeoutMs: this.options.timeoutMs,
        signal: context.signal
      });
      return [{ test: "custom_py_tests", status: result.ok ? "pass" : "fail", detail: result.combined }];
    }

    return [...(await this.smokeCompile(context)), ...(await this.regressionSuite(context))];
  }

  /** Byte-compiles the first few top-level modules. */
  private async smokeCompile(context: StageContext): Promise<TestResult[]> {
    const entries = await fs.readdir(context.workingCopyDir, { withFileTypes: true });
    const modules = entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(".py"))
      .map((entry) => entry.name)
      .sort();

    if (modules.length === 0) {
      return [{ test: "python_smoke_compile", status: "skipped", detail: "No top-level Python modules found" }];
    }

    const results: TestResult[] = [];
    for (const moduleFile of modules.slice(0, MAX_SMOKE_MODULES)) {
      const result = await runOrDescribe({
        cwd: context.workingCopyDir,
        command: this.options.pythonBin,
        args: ["-m", "py_compile", moduleFile],
        timeoutMs: this.options.timeoutMs,
        signal: context.signal
      });

      results.push({
        test: `compile_${path.basename(moduleFile, ".py")}`,
        status: result.ok ? "pass" : "fail",
        detail: result.ok ? `Compiled ${moduleFile}` : result.combined
      });
    }

    if (modules.length > MAX_SMOKE_MODULES) {
      results.push({
        test: "python_smoke_compile",
        status: "skipped",
        detail: `Skipped ${String(modules.length - MAX_SMOKE_MODULES)} additional modules`
      });
    }

    return results;
  }

  private async regressionSuite(context: StageContext): Promise<TestResult[]> {
    const testDirs: string[] = [];
    for (const candidate of PYTEST_DIR_CANDIDATES) {
      if (await pathExists(path.join(context.workingCopyDir, candidate))) {
        testDirs.push(candidate);
      }
    }

    let configured = false;
    for (const configFile of PYTEST_CONFIG_FILES) {
      if (await pathExists(path.join(context.workingCopyDir, configFile))) {
        configured = true;
        break;
      }
    }

    if (testDirs.length === 0 && !configured) {
      return [];
    }

    const result = await runOrDescribe({
      cwd: context.workingCopyDir,
      command: this.options.pythonBin,
      args: ["-m", "pytest", "-q", "--maxfail=1", "--tb=short", ...testDirs],
      timeoutMs: this.options.timeoutMs,
      signal: context.signal
    });

    return [
      {
        test: "pytest_suite",
        status: result.ok ? "pass" : "fail",
        detail: result.ok ? "All tests passed" : result.combined
      }
    ];
  }
}

export interface CppCheckOptions {
  timeoutMs: number;
  qtBehavior: CppQtBehavior;
}

const qtMarkers = ["#include <Q", "#include <Qt", "QWidget", "QMainWindow", "QtSql"];

export async function projectUsesQt(projectDir: string, files: string[]): Promise<boolean> {
  if (files.some((file) => file.endsWith(".pro"))) {
    return true;
  }

  for (const file of files.filter((entry) => entry.endsWith(".cpp") || entry.endsWith(".h"))) {
    const text = await fs.readFile(path.join(projectDir, file), "utf8");
    if (qtMarkers.some((marker) => text.includes(marker))) {
      return true;
    }
  }

  return false;
}

export function explainCompileFailure(output: string): string | null {
  const hints: string[] = [];

  if (output.includes("No such file or directory") && /Qt|QWidget|QMainWindow|QtSql/.test(output)) {
    hints.push("Missing system dependency: Qt development headers (e.g. QtCore, QtGui, QtSql). Install Qt or provide include paths.");
  }

  if (output.toLowerCase().includes("out of memory")) {
    hints.push("Compiler ran out of memory during compile. Try compiling fewer files at once.");
  }

  return hints.length > 0 ? hints.join(" ") : null;
}

export class CppCheckSuite implements CheckSuite {
  constructor(private readonly options: CppCheckOptions) {}

  async run(context: StageContext): Promise<TestResult[]> {
    if (this.options.qtBehavior === "skip") {
      return [
        { test: "C++ compile", status: "skipped", detail: "Skipped by configuration (CPP_QT_BEHAVIOR=skip)." },
        { test: "C++ runtime", status: "skipped", detail: "Skipped runtime tests by configuration." }
      ];
    }

    const files = await listFilesRecursive(context.workingCopyDir);
    const sources = files.filter((file) => file.endsWith(".cpp"));

    if (this.options.qtBehavior === "auto" && (await projectUsesQt(context.workingCopyDir, files))) {
      return [
        { test: "C++ compile", status: "skipped", detail: "Skipped: Qt headers required (missing Qt development packages in runner)." },
        { test: "C++ runtime", status: "skipped", detail: "Skipped runtime tests because Qt is not available in the test environment." }
      ];
    }

    if (sources.length === 0) {
      return [{ test: "C++ compile/run", status: "fail", detail: "No C++ files found" }];
    }

    const executable = process.platform === "win32" ? "main.exe" : "main";
    const compile = await runOrDescribe({
      cwd: context.workingCopyDir,
      command: "g++",
      args: ["-std=c++17", "-Wall", "-Wextra", "-o", executable, ...sources],
      timeoutMs: this.options.timeoutMs,
      signal: context.signal
    });

    if (!compile.ok) {
      const results: TestResult[] = [{ test: "C++ compile", status: "fail", detail: compile.combined }];
      const hint = explainCompileFailure(compile.combined);
      if (hint) {
        results.push({ test: "C++ compile (system deps)", status: "fail", detail: hint });
      }
      return results;
    }

    const execution = await runOrDescribe({
      cwd: context.workingCopyDir,
      command: path.join(context.workingCopyDir, executable),
      timeoutMs: this.options.timeoutMs,
      signal: context.signal
    });

    return [
      { test: "C++ compile", status: "pass", detail: compile.combined },
      { test: "C++ runtime", status: execution.ok ? "pass" : "fail", detail: execution.combined }
    ];
  }
}
