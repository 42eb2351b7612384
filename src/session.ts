import type { CommandGenerator, GeneratedCommand } from "./ai.js";
import { confirmCommand } from "./confirm.js";
import { collectDirectoryContext, type DirectoryContext } from "./context.js";
import type { CommandEditor } from "./editor.js";
import { EXIT_CODES, type SmartFfmpegError, toSmartFfmpegError } from "./errors.js";
import type { CommandExecutor } from "./executor.js";
import { debug } from "./logger.js";
import type { Prompter } from "./prompter.js";
import { type CommandRequest, MEDIA_TOOL, buildCommandRequest } from "./request.js";
import type { TerminalUI } from "./ui.js";

export interface SessionDeps {
  generator: CommandGenerator;
  prompter: Prompter;
  execute: CommandExecutor;
  ui: TerminalUI;
  cwd: string;
  includeContext: boolean;
  openEditor?: CommandEditor;
  signal?: AbortSignal;
}

export const EXIT_WORDS = ["exit", "quit", "q"];
export const INSTRUCTION_PROMPT = ">> ";

const KNOWN_TOOLS = [MEDIA_TOOL, "ffprobe"];

export function usesMediaTool(command: string): boolean {
  const first = command.trim().split(/\s+/)[0] ?? "";
  const base = first.split(/[\\/]/).pop() ?? "";
  return KNOWN_TOOLS.includes(base.replace(/\.exe$/i, ""));
}

function report(ui: TerminalUI, err: unknown): number {
  const error: SmartFfmpegError = toSmartFfmpegError(err);
  debug("request failed", { code: error.code, exitCode: error.exitCode, context: error.context });
  ui.error(error);
  return error.exitCode;
}

async function loadContext(deps: SessionDeps): Promise<DirectoryContext | undefined> {
  if (!deps.includeContext) return undefined;
  try {
    return await collectDirectoryContext(deps.cwd);
  } catch (err) {
    debug("directory listing skipped", { message: err instanceof Error ? err.message : String(err) });
    return undefined;
  }
}

/**
 * Runs one instruction through build → generate → confirm → execute and
 * returns the exit code for it. Failures are reported, never thrown.
 */
export async function processRequest(instruction: string, deps: SessionDeps): Promise<number> {
  const { ui } = deps;

  let request: CommandRequest;
  try {
    request = buildCommandRequest(instruction, await loadContext(deps));
  } catch (err) {
    return report(ui, err);
  }

  const spinner = ui.spinner("Generating command...");
  let generated: GeneratedCommand;
  try {
    generated = await deps.generator.generateCommand(request, deps.signal);
    spinner.stop();
  } catch (err) {
    spinner.fail("Could not generate a command.");
    return report(ui, err);
  }

  if (generated.explanation) {
    ui.explanation(generated.explanation);
  }
  if (!usesMediaTool(generated.command)) {
    ui.warn(`This command does not start with ${MEDIA_TOOL}. Review it carefully.`);
  }

  const outcome = await confirmCommand(generated.command, {
    prompter: deps.prompter,
    ui,
    openEditor: deps.openEditor,
  });
  if (outcome.status === "aborted") {
    ui.info("\n🛑 Command cancelled by user.");
    return EXIT_CODES.aborted;
  }

  ui.info("\n🚀 Executing command...\n");
  try {
    await deps.execute(outcome.command, { cwd: deps.cwd, signal: deps.signal });
  } catch (err) {
    return report(ui, err);
  }
  ui.success("Command executed successfully.");
  return EXIT_CODES.success;
}

/**
 * Asks for instructions until the user types an exit word or input ends.
 * Returns the exit code of the last processed request.
 */
export async function runInteractive(deps: SessionDeps): Promise<number> {
  let lastExitCode: number = EXIT_CODES.success;
  for (;;) {
    if (deps.signal?.aborted) return EXIT_CODES.interrupted;

    deps.ui.info("\nWhat do you want to do? (or 'exit' to quit)");
    const answer = await deps.prompter.prompt(INSTRUCTION_PROMPT);
    if (answer === null || EXIT_WORDS.includes(answer.trim().toLowerCase())) {
      deps.ui.info("Goodbye!");
      return lastExitCode;
    }
    if (!answer.trim()) continue;

    lastExitCode = await processRequest(answer, deps);
  }
}
