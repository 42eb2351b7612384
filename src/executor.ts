import { spawn } from "child_process";
import { constants } from "os";
import {
  ExecutionError,
  type ExecutionResult,
  InterruptedError,
  ToolNotFoundError,
} from "./errors.js";
import { debug } from "./logger.js";

export type { ExecutionResult };

export interface ExecuteOptions {
  cwd?: string;
  signal?: AbortSignal;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

export type CommandExecutor = (
  command: string,
  options?: ExecuteOptions
) => Promise<ExecutionResult>;

export const OUTPUT_CAPTURE_LIMIT = 64 * 1024;

const NOT_FOUND_EXIT_CODES = process.platform === "win32" ? [9009] : [127];

/** First word of a shell command line, skipping `VAR=value` prefixes. */
export function leadingExecutable(command: string): string {
  const tokens = command.trim().split(/\s+/);
  const word = tokens.find((t) => !/^[A-Za-z_][A-Za-z0-9_]*=/.test(t)) ?? "";
  return word.replace(/^["']|["']$/g, "");
}

export function missingToolName(command: string, stderr: string): string {
  const match = stderr.match(/([^\s:'"]+): (?:command )?not found/);
  return match ? match[1] : leadingExecutable(command);
}

function signalNumber(signal: NodeJS.Signals): number {
  const signals: Partial<Record<NodeJS.Signals, number>> = constants.signals;
  return signals[signal] ?? 0;
}

class OutputTail {
  private text = "";

  append(chunk: string): void {
    this.text += chunk;
    if (this.text.length > OUTPUT_CAPTURE_LIMIT) {
      this.text = this.text.slice(-OUTPUT_CAPTURE_LIMIT);
    }
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Runs the command through the platform shell in `cwd`. Output is forwarded
 * chunk by chunk as the child writes it and the tail of each stream is kept
 * for the result.
 */
export function executeCommand(
  command: string,
  options: ExecuteOptions = {}
): Promise<ExecutionResult> {
  const stdoutSink = options.stdout ?? process.stdout;
  const stderrSink = options.stderr ?? process.stderr;

  return new Promise<ExecutionResult>((resolve, reject) => {
    if (options.signal?.aborted) {
      reject(new InterruptedError());
      return;
    }

    debug("spawning command", { command, cwd: options.cwd ?? process.cwd() });
    const child = spawn(command, {
      cwd: options.cwd,
      env: options.env,
      shell: true,
      stdio: ["inherit", "pipe", "pipe"],
      signal: options.signal,
    });

    const stdout = new OutputTail();
    const stderr = new OutputTail();
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      fn();
    };

    child.stdout?.setEncoding("utf-8");
    child.stderr?.setEncoding("utf-8");
    child.stdout?.on("data", (chunk: string) => {
      stdout.append(chunk);
      stdoutSink.write(chunk);
    });
    child.stderr?.on("data", (chunk: string) => {
      stderr.append(chunk);
      stderrSink.write(chunk);
    });

    child.on("error", (err: NodeJS.ErrnoException) => {
      debug("spawn error", { name: err.name, code: err.code, message: err.message });
      settle(() => {
        if (err.name === "AbortError" || options.signal?.aborted) {
          reject(new InterruptedError());
        } else {
          reject(
            new ExecutionError({ exitCode: 1, stdout: stdout.toString(), stderr: err.message })
          );
        }
      });
    });

    child.on("close", (code, signal) => {
      debug("command finished", { code, signal });
      settle(() => {
        if (options.signal?.aborted) {
          reject(new InterruptedError());
          return;
        }

        const exitCode = code ?? (signal ? 128 + signalNumber(signal) : 1);
        const result: ExecutionResult = {
          exitCode,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
        };

        if (exitCode === 0) {
          resolve(result);
        } else if (code !== null && NOT_FOUND_EXIT_CODES.includes(code)) {
          reject(new ToolNotFoundError(missingToolName(command, result.stderr)));
        } else {
          reject(new ExecutionError(result, signal ?? undefined));
        }
      });
    });
  });
}
