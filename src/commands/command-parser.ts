import type { Language } from "../types.js";

export type StageAction = "static" | "dynamic" | "patch" | "auto_fix";

export type CommandIntent =
  | { kind: "greeting" }
  | { kind: "wellbeing" }
  | { kind: "farewell" }
  | { kind: "run"; action: StageAction; language: Language }
  | { kind: "compare"; filePath?: string }
  | { kind: "unknown"; input: string };

const actionAliases: Record<string, StageAction> = {
  static: "static",
  dynamic: "dynamic",
  patch: "patch",
  auto_fix: "auto_fix",
  "auto-fix": "auto_fix",
  autofix: "auto_fix"
};

const languageAliases: Record<string, Language> = {
  py: "py",
  python: "py",
  cpp: "cpp",
  "c++": "cpp"
};

function conversationalIntent(normalized: string): CommandIntent | null {
  if (/^(hello|hi|hey)\b/.test(normalized)) {
    return { kind: "greeting" };
  }

  if (/^how are you\b/.test(normalized)) {
    return { kind: "wellbeing" };
  }

  if (/^(bye|goodbye)\b/.test(normalized)) {
    return { kind: "farewell" };
  }

  return null;
}

/**
 * Grammar:
 *   hello | hi | hey ... / how are you ... / bye | goodbye ...
 *   [run] <static|dynamic|patch|auto_fix> <py|cpp>
 *   compare [patch] [<relative/path>]
 */
export function parseCommand(input: string): CommandIntent {
  const trimmed = input.trim();
  const normalized = trimmed.toLowerCase().replace(/\s+/g, " ");

  const conversational = conversationalIntent(normalized);
  if (conversational) {
    return conversational;
  }

  const rawTokens = trimmed.split(/\s+/).filter(Boolean);
  const tokens = rawTokens.map((token) => token.toLowerCase());
  if (tokens[0] === "run") {
    tokens.shift();
    rawTokens.shift();
  }

  if (tokens[0] === "compare") {
    let rest = rawTokens.slice(1);
    if (tokens[1] === "patch" || tokens[1] === "patched") {
      rest = rawTokens.slice(2);
    }

    if (rest.length === 0) {
      return { kind: "compare" };
    }
    if (rest.length === 1 && rest[0]) {
      return { kind: "compare", filePath: rest[0] };
    }
    return { kind: "unknown", input: trimmed };
  }

  if (tokens.length === 2) {
    const action = actionAliases[tokens[0] ?? ""];
    const language = languageAliases[tokens[1] ?? ""];
    if (action && language) {
      return { kind: "run", action, language };
    }
  }

  return { kind: "unknown", input: trimmed };
}
