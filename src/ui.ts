import chalk from "chalk";
import ora from "ora";
import {
  AuthenticationError,
  ConfigurationError,
  ExecutionError,
  NetworkError,
  RateLimitError,
  type SmartFfmpegError,
  ToolNotFoundError,
} from "./errors.js";

export interface Spinner {
  fail(text?: string): void;
  stop(): void;
}

export interface TerminalUI {
  banner(): void;
  command(command: string, heading?: string): void;
  explanation(text: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(err: SmartFfmpegError): void;
  spinner(text: string): Spinner;
}

const RULE = "------------------------------------------";

const FFMPEG_TOOLS = new Set(["ffmpeg", "ffprobe"]);

export function hintFor(err: SmartFfmpegError): string | undefined {
  if (err instanceof ToolNotFoundError) {
    const source = FFMPEG_TOOLS.has(err.tool) ? " (https://ffmpeg.org/download.html)" : "";
    return `Install ${err.tool}${source} and make sure it is on your PATH.`;
  }
  if (err instanceof ConfigurationError || err instanceof AuthenticationError) {
    return "Check OPENROUTER_API_KEY in your environment or .env file.";
  }
  if (err instanceof RateLimitError) {
    return "Wait a moment before retrying, or choose another model with OPENROUTER_MODEL.";
  }
  if (err instanceof NetworkError) {
    return "Check your network connection and OPENROUTER_BASE_URL.";
  }
  return undefined;
}

export function createTerminalUI(
  stream: NodeJS.WritableStream = process.stdout,
  errorStream: NodeJS.WritableStream = process.stderr
): TerminalUI {
  const print = (line = "") => stream.write(line + "\n");

  return {
    banner() {
      print(chalk.bold.blue("🎬 smart-ffmpeg"));
      print(chalk.italic.dim("Natural language to ffmpeg, powered by OpenRouter"));
    },

    command(command, heading = "✅ Generated Command:") {
      print(RULE);
      print(chalk.bold(heading));
      print(`\n   $ ${chalk.cyan(command)}\n`);
      print(RULE);
    },

    explanation(text) {
      print(chalk.green("💡 ") + text);
    },

    info(message) {
      print(message);
    },

    success(message) {
      print(chalk.bold.green(`\n✅ ${message}`));
    },

    warn(message) {
      print(chalk.yellow(`⚠️  ${message}`));
    },

    error(err) {
      const label = err instanceof ExecutionError ? "Failed!" : "Error:";
      errorStream.write(chalk.bold.red(`\n❌ ${label}`) + ` ${err.message}\n`);
      const hint = hintFor(err);
      if (hint) errorStream.write(chalk.dim(`   ${hint}`) + "\n");
    },

    spinner(text) {
      const instance = ora({ text, stream: errorStream, spinner: "arc" }).start();
      return {
        fail: (failed?: string) => {
          instance.fail(failed);
        },
        stop: () => {
          instance.stop();
        },
      };
    },
  };
}
