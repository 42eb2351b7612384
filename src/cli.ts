import { Command } from "commander";
import { CompletionClient } from "./ai.js";
import { type AppConfig, loadConfig } from "./config.js";
import { editCommandInEditor } from "./editor.js";
import { EXIT_CODES, toSmartFfmpegError } from "./errors.js";
import { executeCommand } from "./executor.js";
import { createReadlinePrompter } from "./prompter.js";
import { type SessionDeps, processRequest, runInteractive } from "./session.js";
import { createTerminalUI } from "./ui.js";

export const VERSION = "1.0.0";

export interface CliOptions {
  instruction: string;
  model?: string;
  context: boolean;
}

export function buildProgram(onRun: (options: CliOptions) => Promise<void>): Command {
  return new Command()
    .name("smart-ffmpeg")
    .version(VERSION)
    .description("smart-ffmpeg: natural language to ffmpeg command generator.")
    .argument(
      "[instruction...]",
      "What to do with your media. Omit it to start an interactive session."
    )
    .option("-m, --model <model>", "OpenRouter model id (overrides OPENROUTER_MODEL)")
    .option("--no-context", "do not send the current directory's file listing to the model")
    // Instruction words such as "-6dB" are not options.
    .allowUnknownOption()
    .passThroughOptions()
    .action(async (instruction: string[], opts: { model?: string; context: boolean }) => {
      await onRun({
        instruction: instruction.join(" "),
        model: opts.model,
        context: opts.context,
      });
    });
}

export async function runSession(options: CliOptions, signal: AbortSignal): Promise<number> {
  const ui = createTerminalUI();

  let config: AppConfig;
  try {
    config = await loadConfig({
      overrides: { model: options.model, includeContext: options.context },
    });
  } catch (err) {
    const error = toSmartFfmpegError(err);
    ui.error(error);
    return error.exitCode;
  }

  const deps: SessionDeps = {
    generator: new CompletionClient(config),
    prompter: createReadlinePrompter(),
    execute: executeCommand,
    openEditor: editCommandInEditor,
    ui,
    cwd: process.cwd(),
    includeContext: config.includeContext,
    signal,
  };

  // A blank instruction given on the command line still goes through the builder, which rejects it.
  if (options.instruction.length > 0) {
    return processRequest(options.instruction, deps);
  }

  ui.banner();
  return runInteractive(deps);
}

export type SessionRunner = (options: CliOptions, signal: AbortSignal) => Promise<number>;

export async function run(argv: string[], session: SessionRunner = runSession): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.on("SIGINT", onInterrupt);

  let exitCode: number = EXIT_CODES.success;
  try {
    await buildProgram(async (options) => {
      exitCode = await session(options, controller.signal);
    }).parseAsync(argv);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
  return controller.signal.aborted ? EXIT_CODES.interrupted : exitCode;
}
