import type { CommandEditor } from "./editor.js";
import type { Prompter } from "./prompter.js";
import type { TerminalUI } from "./ui.js";

export type ConfirmationOutcome =
  | { status: "confirmed"; command: string; edited: boolean }
  | { status: "aborted" };

export interface ConfirmationOptions {
  prompter: Prompter;
  ui: TerminalUI;
  openEditor?: CommandEditor;
}

export const ACTION_PROMPT = "Action? (y: execute / n: abort / e: edit / v: open in $EDITOR): ";
export const EDIT_PROMPT = "New command (leave empty to keep the current one): ";

type Action = "confirm" | "abort" | "edit" | "editor";

const ACTIONS: Record<string, Action> = {
  y: "confirm",
  yes: "confirm",
  n: "abort",
  no: "abort",
  abort: "abort",
  e: "edit",
  edit: "edit",
  v: "editor",
  editor: "editor",
};

export function parseAction(answer: string): Action | undefined {
  const key = answer.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(ACTIONS, key) ? ACTIONS[key] : undefined;
}

/**
 * Shows the command and waits for the user's decision. Edits loop back to the
 * same question, so an edited command is always confirmed explicitly before
 * it can run.
 */
const EDITED_HEADING = "✏️  Edited Command:";

export async function confirmCommand(
  generated: string,
  { prompter, ui, openEditor }: ConfirmationOptions
): Promise<ConfirmationOutcome> {
  let command = generated;
  let edited = false;

  ui.command(command);
  for (;;) {
    const answer = await prompter.prompt(ACTION_PROMPT);
    if (answer === null) {
      return { status: "aborted" };
    }

    const action = parseAction(answer);
    switch (action) {
      case "confirm":
        return { status: "confirmed", command, edited };

      case "abort":
        return { status: "aborted" };

      case "edit": {
        const replacement = await prompter.prompt(EDIT_PROMPT);
        if (replacement === null) {
          return { status: "aborted" };
        }
        if (replacement.trim()) {
          command = replacement.trim();
          edited = true;
        }
        ui.command(command, edited ? EDITED_HEADING : undefined);
        break;
      }

      case "editor": {
        if (!openEditor) {
          ui.warn("No editor available. Use 'e' to type a replacement instead.");
          break;
        }
        try {
          const replacement = await openEditor(command);
          if (replacement) {
            command = replacement;
            edited = true;
          }
        } catch (err) {
          ui.warn(
            `Failed to edit command: ${err instanceof Error ? err.message : String(err)}. Keeping the previous one.`
          );
        }
        ui.command(command, edited ? EDITED_HEADING : undefined);
        break;
      }

      default:
        ui.info("Invalid action. Please enter y, n, e or v.");
    }
  }
}
