import { promises as fs } from "node:fs";
import path from "node:path";
import { pathExists, safeResolvePath } from "../lib/fs-utils.js";
import type { Language } from "../types.js";

export const MAX_SNIPPETS = 20;
const CONTEXT_LINES = 5;

const referencePatterns: Record<Language, RegExp> = {
  py: /([^\s:]+\.py):(\d+):/g,
  cpp: /([^\s:]+\.cpp):(\d+):/g
};

export interface IssueReference {
  file: string;
  line: number;
}

export function findIssueReferences(report: string, language: Language): IssueReference[] {
  const references: IssueReference[] = [];

  for (const match of report.matchAll(referencePatterns[language])) {
    const file = match[1];
    const line = Number(match[2]);
    if (file && Number.isInteger(line) && line > 0) {
      references.push({ file, line });
    }
  }

  return references;
}

async function resolveWithinRepo(repoRoot: string, file: string): Promise<string | null> {
  const relative = path.isAbsolute(file) ? path.relative(repoRoot, file) : file;
  const candidates = [relative];

  // linters sometimes prefix the repo folder name: repo_name/foo.py
  const segments = relative.replaceAll("\\", "/").split("/");
  if (segments.length > 1) {
    candidates.push(segments.slice(1).join("/"));
  }

  for (const candidate of candidates) {
    try {
      const resolved = safeResolvePath(repoRoot, candidate);
      if (await pathExists(resolved)) {
        return resolved;
      }
    } catch {
      continue;
    }
  }

  return null;
}

/** Source excerpts around the first issues a static report points at. */
export async function extractIssueSnippets(report: string, repoRoot: string, language: Language): Promise<string> {
  const entries: string[] = [];

  for (const reference of findIssueReferences(report, language).slice(0, MAX_SNIPPETS)) {
    const sourceFile = await resolveWithinRepo(repoRoot, reference.file);
    if (!sourceFile) {
      continue;
    }

    const lines = (await fs.readFile(sourceFile, "utf8")).split(/\r?\n/);
    const start = Math.max(0, reference.line - CONTEXT_LINES);
    const end = Math.min(lines.length, reference.line + CONTEXT_LINES);
    const snippet = lines.slice(start, end).join("\n");
    entries.push(`--- ${reference.file}:${String(reference.line)} ---\n${snippet}\n`);
  }

  return entries.join("\n\n");
}
