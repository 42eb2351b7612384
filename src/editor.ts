import { spawn } from "child_process";
import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { debug } from "./logger.js";

export type CommandEditor = (initialCommand: string) => Promise<string>;

const TEMP_FILE_NAME = `smart-ffmpeg-command-${process.pid}.sh`;

export function resolveEditor(env: NodeJS.ProcessEnv = process.env): string {
  return env.VISUAL || env.EDITOR || (process.platform === "win32" ? "notepad" : "nano");
}

/**
 * Opens the command in the user's editor and returns the saved text, trimmed.
 * Rejects when the editor cannot be started or exits non-zero.
 */
export async function editCommandInEditor(
  initialCommand: string,
  editor: string = resolveEditor()
): Promise<string> {
  const tempFilePath = join(tmpdir(), TEMP_FILE_NAME);
  debug("opening editor", { editor, tempFilePath });

  await fs.writeFile(tempFilePath, initialCommand);
  try {
    await new Promise<void>((resolve, reject) => {
      const editorProcess = spawn(editor, [tempFilePath], {
        stdio: "inherit",
        shell: true,
      });
      editorProcess.on("error", (err) => reject(err));
      editorProcess.on("close", (code) => {
        if (code === 0) resolve();
        else reject(new Error(`Editor exited with code ${code}`));
      });
    });

    return (await fs.readFile(tempFilePath, "utf-8")).trim();
  } finally {
    await fs.rm(tempFilePath, { force: true });
  }
}
