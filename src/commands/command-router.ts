import { CompareError, WorkspaceNotFoundError } from "../lib/errors.js";
import { errorMessage, logInfo } from "../lib/logging.js";
import { cleanDynamicReport, DEFAULT_AUTO_FIX_MAX_ITERATIONS } from "../pipeline/pipeline-runner.js";
import { stageContextFor, type Toolchain } from "../pipeline/stages.js";
import { generateWorkspacePatches } from "../tools/patch-pipeline.js";
import type { JsonValue, WorkspaceDescriptor } from "../types.js";
import type { WorkspaceRegistry } from "../workspace/registry.js";
import { parseCommand, type CommandIntent, type StageAction } from "./command-parser.js";
import { comparePatch } from "./compare.js";

export const GREETING_REPLY = "Hello! Ready to analyze your code.";
export const WELLBEING_REPLY = "I'm great! Let's fix some code today.";
export const FAREWELL_REPLY = "Goodbye!";
export const NO_WORKSPACE_WARNING = "Please upload a file before running commands.";
export const HELP_MESSAGE =
  "Unknown command. Commands take the form '[run] <action> <language>' with nothing else on the line, " +
  "where <action> is static, dynamic, patch or auto_fix and <language> is py or cpp (for example 'run static py'). " +
  "Use 'compare patch [path]' to diff a file against the upload.";

export type CommandOutcome =
  | { status: "ok"; result: JsonValue }
  | { status: "no_workspace"; message: string };

export interface CommandRouterDeps {
  registry: WorkspaceRegistry;
  toolchain: Toolchain;
  autoFixMaxIterations?: number;
}

/**
 * Foreground entry point for operator commands. Commands run the same stage
 * implementations as the background pipeline, directly against a workspace.
 */
export class CommandRouter {
  constructor(private readonly deps: CommandRouterDeps) {}

  async interpret(text: string, workspaceId?: string): Promise<CommandOutcome> {
    const intent = parseCommand(text);

    switch (intent.kind) {
      case "greeting":
        return { status: "ok", result: GREETING_REPLY };
      case "wellbeing":
        return { status: "ok", result: WELLBEING_REPLY };
      case "farewell":
        return { status: "ok", result: FAREWELL_REPLY };
      default:
        break;
    }

    const workspace = await this.resolveWorkspace(workspaceId);
    if (!workspace) {
      return { status: "no_workspace", message: NO_WORKSPACE_WARNING };
    }

    return { status: "ok", result: await this.dispatch(intent, workspace) };
  }

  async resolveWorkspace(workspaceId?: string): Promise<WorkspaceDescriptor | undefined> {
    if (!workspaceId) {
      return this.deps.registry.latest();
    }

    const workspace = await this.deps.registry.resolve(workspaceId);
    if (!workspace) {
      throw new WorkspaceNotFoundError(workspaceId);
    }
    return workspace;
  }

  private async dispatch(intent: CommandIntent, workspace: WorkspaceDescriptor): Promise<JsonValue> {
    if (intent.kind === "compare") {
      try {
        return await comparePatch(workspace, intent.filePath);
      } catch (error) {
        if (error instanceof CompareError) {
          return `[Error] ${error.message}`;
        }
        throw error;
      }
    }

    if (intent.kind !== "run") {
      return HELP_MESSAGE;
    }

    if (intent.language !== workspace.language) {
      return `Workspace ${workspace.id} holds ${workspace.language} sources; '${intent.action} ${intent.language}' does not apply.`;
    }

    logInfo("command.run", { workspaceId: workspace.id, action: intent.action, language: intent.language });

    try {
      return await this.runAction(intent.action, workspace);
    } catch (error) {
      return `[Error] ${errorMessage(error)}`;
    }
  }

  private async runAction(action: StageAction, workspace: WorkspaceDescriptor): Promise<JsonValue> {
    const tools = this.deps.toolchain[workspace.language];
    const context = stageContextFor(workspace);

    switch (action) {
      case "static":
        return tools.analyzer.analyze(context);
      case "dynamic":
        return cleanDynamicReport((await tools.tester.test(context)).report);
      case "patch": {
        const generated = await generateWorkspacePatches(context, tools);
        return `Patch pipeline executed: ${String(generated.length)} patch file(s) ready in patches/.`;
      }
      case "auto_fix":
        return tools.fixer.fix(context, this.deps.autoFixMaxIterations ?? DEFAULT_AUTO_FIX_MAX_ITERATIONS);
    }
  }
}
