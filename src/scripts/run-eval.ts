import "dotenv/config";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { loadConfig } from "../lib/config.js";
import { hasErrorCode } from "../lib/fs-utils.js";
import { errorMessage } from "../lib/logging.js";
import { PATCHES_DIR_NAME, workingCopyPath } from "../lib/workspace.js";
import type { StageContext, Toolchain } from "../pipeline/stages.js";
import { createDefaultToolchain } from "../tools/toolchain.js";
import type { JsonValue } from "../types.js";

export const EVAL_AUTO_FIX_ITERATIONS = 3;

const bugCaseSchema = z.object({
  id: z.string().min(1),
  language: z.enum(["py", "cpp"]),
  workspace: z.string().min(1),
  description: z.string().default("")
});

const datasetSchema = z.array(bugCaseSchema);

export type BugCase = z.infer<typeof bugCaseSchema>;

export interface BugResult {
  id: string;
  language: string;
  workspace: string;
  detection_log: string;
  dynamic_log: string;
  auto_fix_summary: string;
  detected: boolean;
  tests_passed: boolean;
  repair_successful: boolean;
  duration_seconds: number;
}

export interface EvalOptions {
  datasetPath: string;
  outputPath: string;
}

type OptionMap = Record<string, string | boolean>;

function parseArgs(argv: string[]): OptionMap {
  const options: OptionMap = {};

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (!token.startsWith("--")) {
      continue;
    }

    const eqIndex = token.indexOf("=");
    if (eqIndex > 2) {
      options[token.slice(2, eqIndex)] = token.slice(eqIndex + 1);
      continue;
    }

    const key = token.slice(2);
    const next = argv[index + 1];

    if (next && !next.startsWith("--")) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = true;
  }

  return options;
}

function optionString(options: OptionMap, key: string): string | undefined {
  const value = options[key];
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function parseEvalOptions(argv: string[], cwd = process.cwd()): EvalOptions {
  const options = parseArgs(argv);

  return {
    datasetPath: path.resolve(cwd, optionString(options, "dataset") ?? "eval_dataset.json"),
    outputPath: path.resolve(cwd, optionString(options, "output") ?? path.join("reports", "eval_results.json"))
  };
}

export async function loadDataset(datasetPath: string): Promise<BugCase[]> {
  let text: string;
  try {
    text = await readFile(datasetPath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      throw new Error(`Dataset file not found: ${datasetPath}`);
    }
    throw error;
  }

  return datasetSchema.parse(JSON.parse(text));
}

function isRepairSuccessful(report: JsonValue): boolean {
  return typeof report === "object" && report !== null && !Array.isArray(report) && report.success === true;
}

function failedCase(bugCase: BugCase, error: unknown): BugResult {
  return {
    id: bugCase.id,
    language: bugCase.language,
    workspace: bugCase.workspace,
    detection_log: errorMessage(error),
    dynamic_log: "",
    auto_fix_summary: "",
    detected: false,
    tests_passed: false,
    repair_successful: false,
    duration_seconds: 0
  };
}

/**
 * Runs every stage against an already extracted workspace. `workspace` is
 * resolved against `baseDir` and must contain the language's working copy.
 */
export async function runCase(bugCase: BugCase, toolchain: Toolchain, baseDir: string): Promise<BugResult> {
  const workspaceDir = path.resolve(baseDir, bugCase.workspace);
  const context: StageContext = {
    workspaceId: path.basename(workspaceDir),
    language: bugCase.language,
    workspaceDir,
    workingCopyDir: workingCopyPath(workspaceDir, bugCase.language),
    patchesDir: path.join(workspaceDir, PATCHES_DIR_NAME)
  };

  if (!(await isDirectory(context.workingCopyDir))) {
    return failedCase(bugCase, new Error(`Workspace ${bugCase.workspace} does not exist.`));
  }

  const tools = toolchain[bugCase.language];
  const startedAt = Date.now();

  try {
    const staticLog = await tools.analyzer.analyze(context);
    const dynamicLog = (await tools.tester.test(context)).report;
    const autoFix = await tools.fixer.fix(context, EVAL_AUTO_FIX_ITERATIONS);
    const lowered = staticLog.toLowerCase();

    return {
      id: bugCase.id,
      language: bugCase.language,
      workspace: bugCase.workspace,
      detection_log: staticLog,
      dynamic_log: dynamicLog,
      auto_fix_summary: JSON.stringify(autoFix),
      detected: lowered.includes("error") || lowered.includes("bug"),
      tests_passed: !dynamicLog.includes("FAIL"),
      repair_successful: isRepairSuccessful(autoFix),
      duration_seconds: (Date.now() - startedAt) / 1000
    };
  } catch (error) {
    return failedCase(bugCase, error);
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

export async function runEvaluation(cases: BugCase[], toolchain: Toolchain, baseDir: string): Promise<BugResult[]> {
  const results: BugResult[] = [];
  for (const bugCase of cases) {
    results.push(await runCase(bugCase, toolchain, baseDir));
  }
  return results;
}

async function main(): Promise<void> {
  const options = parseEvalOptions(process.argv.slice(2));
  const config = loadConfig();
  const cases = await loadDataset(options.datasetPath);
  const results = await runEvaluation(cases, createDefaultToolchain(config.tools), path.dirname(options.datasetPath));

  await mkdir(path.dirname(options.outputPath), { recursive: true });
  await writeFile(options.outputPath, `${JSON.stringify(results, null, 2)}\n`, "utf8");
  process.stdout.write(`[+] Evaluation results saved to ${options.outputPath}\n`);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    process.stderr.write(`${errorMessage(error)}\n`);
    process.exitCode = 1;
  });
}
