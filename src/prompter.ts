import * as readline from "readline";

/** The one capability the interactive steps need from a terminal. */
export interface Prompter {
  /** Resolves to `null` once input has ended (Ctrl+D, Ctrl+C or a closed pipe). */
  prompt(text: string): Promise<string | null>;
}

/**
 * Opens a readline interface per question and closes it again, so the
 * terminal is released while a child process owns stdin.
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  let ended = false;
  input.once("end", () => {
    ended = true;
  });

  return {
    prompt(text: string): Promise<string | null> {
      if (ended) return Promise.resolve(null);

      return new Promise((resolve) => {
        const rl = readline.createInterface({ input, output });
        let answered = false;

        rl.on("SIGINT", () => {
          output.write("\n");
          rl.close();
        });
        rl.on("close", () => {
          if (!answered) resolve(null);
        });
        rl.question(text, (answer) => {
          answered = true;
          rl.close();
          resolve(answer);
        });
      });
    },
  };
}
