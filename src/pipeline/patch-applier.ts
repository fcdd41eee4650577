import { promises as fs } from "node:fs";
import path from "node:path";
import { hasErrorCode } from "../lib/fs-utils.js";
import { errorMessage, logInfo, logWarn } from "../lib/logging.js";
import { runCommand } from "../lib/process-runner.js";
import type { PatchRecord } from "../types.js";

export const PATCH_FILE_PATTERN = /^patch_.*\.diff$/;

// Patches that went in are moved here so a later run does not apply them twice.
export const APPLIED_PATCHES_DIR_NAME = "applied";

const REJECTED_HUNKS_PATTERN = /^Applying patch .+ with \d+ rejects?\.\.\.$/m;

export interface PatchTier {
  label: string;
  args: string[];
}

export const PATCH_TIERS: readonly PatchTier[] = [
  { label: "strict", args: [] },
  { label: "--unidiff-zero", args: ["--unidiff-zero"] },
  { label: "--reject", args: ["--reject"] }
];

export interface PatchAttempt {
  ok: boolean;
  output: string;
}

/** Applies one patch text to a directory with extra tool flags. */
export interface PatchTool {
  apply(input: { targetDir: string; patchText: string; args: string[]; signal?: AbortSignal }): Promise<PatchAttempt>;
}

export class GitApplyTool implements PatchTool {
  constructor(private readonly timeoutMs: number) {}

  async apply(input: { targetDir: string; patchText: string; args: string[]; signal?: AbortSignal }): Promise<PatchAttempt> {
    try {
      const result = await runCommand({
        cwd: input.targetDir,
        command: "git",
        args: ["apply", ...input.args, "-"],
        input: input.patchText,
        env: { LC_ALL: "C" },
        timeoutMs: this.timeoutMs,
        signal: input.signal
      });
      // --reject exits non-zero once a hunk lands in a .rej file, yet the other hunks are written
      const partial = input.args.includes("--reject") && REJECTED_HUNKS_PATTERN.test(result.combined);
      return { ok: result.ok || partial, output: result.combined };
    } catch (error) {
      return { ok: false, output: errorMessage(error) };
    }
  }
}

function firstLine(output: string): string {
  const line = output
    .split(/\r?\n/)
    .map((entry) => entry.trim())
    .find(Boolean);
  return line || "unknown error";
}

export function successDetail(tier: PatchTier): string {
  return tier.args.length === 0 ? "applied cleanly" : `applied with ${tier.label}`;
}

export async function discoverPatchFiles(patchDir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(patchDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && PATCH_FILE_PATTERN.test(entry.name))
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return [];
    }
    throw error;
  }
}

export class PatchApplier {
  constructor(private readonly tool: PatchTool) {}

  /**
   * Applies every `patch_*.diff` in lexicographic order. Each patch walks the
   * tiers until one succeeds; a failed patch is recorded and the batch goes on.
   * Applied patches move to `applied/` under the patch directory.
   */
  async applyAll(targetDir: string, patchDir: string, signal?: AbortSignal): Promise<PatchRecord[]> {
    const names = await discoverPatchFiles(patchDir);
    const records: PatchRecord[] = [];

    for (const name of names) {
      records.push(await this.applyOne(targetDir, path.join(patchDir, name), name, signal));
    }

    if (names.length > 0) {
      logInfo("patch.batch_applied", {
        targetDir,
        total: records.length,
        applied: records.filter((record) => record.status === "success").length
      });
    }

    return records;
  }

  private async applyOne(targetDir: string, patchPath: string, name: string, signal?: AbortSignal): Promise<PatchRecord> {
    let patchText: string;
    try {
      patchText = await fs.readFile(patchPath, "utf8");
    } catch (error) {
      return { name, status: "failed", detail: `read error: ${errorMessage(error)}` };
    }

    let strictFailure: string | null = null;

    for (const tier of PATCH_TIERS) {
      const attempt = await this.tool.apply({ targetDir, patchText, args: tier.args, signal });

      if (attempt.ok) {
        await this.retire(patchPath, name);
        return { name, status: "success", detail: successDetail(tier) };
      }

      if (strictFailure === null) {
        strictFailure = firstLine(attempt.output);
      }
    }

    logWarn("patch.failed", { name, reason: strictFailure });
    return { name, status: "failed", detail: strictFailure ?? "unknown error" };
  }

  private async retire(patchPath: string, name: string): Promise<void> {
    const appliedDir = path.join(path.dirname(patchPath), APPLIED_PATCHES_DIR_NAME);

    try {
      await fs.mkdir(appliedDir, { recursive: true });
      await fs.rename(patchPath, path.join(appliedDir, name));
    } catch (error) {
      logWarn("patch.retire_failed", { name, reason: errorMessage(error) });
    }
  }
}
