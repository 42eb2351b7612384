import { Writable } from "stream";
import type { SmartFfmpegError } from "../errors.js";
import type { Prompter } from "../prompter.js";
import type { Spinner, TerminalUI } from "../ui.js";

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async prompt(text: string): Promise<string | null> {
    this.questions.push(text);
    return this.answers.shift() ?? null;
  }
}

export interface RecordingUI extends TerminalUI {
  readonly events: string[];
  readonly errors: SmartFfmpegError[];
}

export function recordingUI(): RecordingUI {
  const events: string[] = [];
  const errors: SmartFfmpegError[] = [];
  const spinner: Spinner = {
    fail: () => undefined,
    stop: () => undefined,
  };

  return {
    events,
    errors,
    banner: () => events.push("banner"),
    command: (command, heading) => events.push(`command:${heading ?? "generated"}:${command}`),
    explanation: (text) => events.push(`explanation:${text}`),
    info: (message) => events.push(`info:${message}`),
    success: (message) => events.push(`success:${message}`),
    warn: (message) => events.push(`warn:${message}`),
    error: (err) => {
      errors.push(err);
      events.push(`error:${err.code}`);
    },
    spinner: () => spinner,
  };
}

export function memoryStream(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

export function completionBody(content: string | null): string {
  return JSON.stringify({
    id: "gen-test",
    object: "chat.completion",
    created: 0,
    model: "test/model",
    choices: [
      {
        index: 0,
        message: { role: "assistant", content },
        finish_reason: "stop",
      },
    ],
  });
}

export function jsonResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { "content-type": "application/json" },
  });
}
