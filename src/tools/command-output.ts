import { errorMessage } from "../lib/logging.js";
import { runCommand, type RunCommandInput } from "../lib/process-runner.js";

/** Combined stdout and stderr of a command, or an `[Error] ...` line when it cannot start. */
export async function captureCommandOutput(input: RunCommandInput): Promise<string> {
  try {
    const result = await runCommand(input);
    return result.combined;
  } catch (error) {
    return `[Error] ${errorMessage(error)}`;
  }
}
