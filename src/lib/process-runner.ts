import { spawn } from "node:child_process";

const MAX_CAPTURED_CHARS = 400_000;

export interface CommandResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  combined: string;
  timedOut: boolean;
  aborted: boolean;
}

export interface RunCommandInput {
  cwd: string;
  command: string;
  args?: string[];
  input?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  env?: NodeJS.ProcessEnv;
  shell?: boolean;
}

function truncateOutput(value: string): string {
  if (value.length <= MAX_CAPTURED_CHARS) {
    return value;
  }

  return value.slice(value.length - MAX_CAPTURED_CHARS);
}

/**
 * Runs a command in its own process group. When the deadline passes or the
 * signal aborts, the whole group receives SIGTERM and, one second later,
 * SIGKILL. Resolves with the exit status; rejects only when the process
 * cannot be spawned.
 */
export function runCommand(input: RunCommandInput): Promise<CommandResult> {
  const args = input.args ?? [];

  return new Promise((resolve, reject) => {
    if (input.signal?.aborted) {
      reject(new Error(`Command aborted before start: ${input.command}`));
      return;
    }

    const child = spawn(input.command, args, {
      cwd: input.cwd,
      env: {
        ...process.env,
        ...input.env
      },
      shell: input.shell ?? false,
      detached: process.platform !== "win32",
      stdio: ["pipe", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let combined = "";
    let timedOut = false;
    let aborted = false;
    let settled = false;

    const append = (chunk: Buffer, stream: "stdout" | "stderr"): void => {
      const text = chunk.toString("utf8");
      if (stream === "stdout") {
        stdout = truncateOutput(stdout + text);
      } else {
        stderr = truncateOutput(stderr + text);
      }
      combined = truncateOutput(combined + text);
    };

    const signalGroup = (signal: NodeJS.Signals): void => {
      const pid = child.pid;
      if (pid && pid > 0 && process.platform !== "win32") {
        try {
          process.kill(-pid, signal);
          return;
        } catch {
          // group already gone; fall through to the direct child
        }
      }

      if (child.exitCode === null && !child.killed) {
        child.kill(signal);
      }
    };

    const terminate = (): void => {
      signalGroup("SIGTERM");
      setTimeout(() => signalGroup("SIGKILL"), 1_000).unref();
    };

    const timeout = setTimeout(() => {
      timedOut = true;
      terminate();
    }, input.timeoutMs);

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    input.signal?.addEventListener("abort", onAbort, { once: true });

    const cleanup = (): void => {
      clearTimeout(timeout);
      input.signal?.removeEventListener("abort", onAbort);
    };

    child.stdout.on("data", (chunk: Buffer) => append(chunk, "stdout"));
    child.stderr.on("data", (chunk: Buffer) => append(chunk, "stderr"));
    // EPIPE when the command exits without reading its input
    child.stdin.on("error", () => undefined);

    child.on("error", (error) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();
      reject(error);
    });

    child.on("close", (code) => {
      if (settled) {
        return;
      }
      settled = true;
      cleanup();

      const exitCode = Number.isInteger(code) ? Number(code) : 1;
      if (timedOut) {
        combined = `${combined}\n[timeout] ${input.command} exceeded ${String(input.timeoutMs)}ms`.trim();
      }

      resolve({
        ok: exitCode === 0 && !timedOut && !aborted,
        exitCode,
        stdout,
        stderr,
        combined,
        timedOut,
        aborted
      });
    });

    if (typeof input.input === "string") {
      child.stdin.end(input.input, "utf8");
    } else {
      child.stdin.end();
    }
  });
}

export function describeCommand(command: string, args: string[] = []): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
