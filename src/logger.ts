import { appendFileSync } from "fs";

// Read on every call: .env is loaded after this module is imported.
export function debug(message: string, data?: unknown): void {
  if (!process.env.SMART_FFMPEG_DEBUG) return;
  const line = `[smart-ffmpeg debug] ${new Date().toISOString()} ${message}${
    data !== undefined ? " " + JSON.stringify(data) : ""
  }`;
  process.stderr.write(line + "\n");
  const logFile = process.env.SMART_FFMPEG_LOG_FILE;
  if (!logFile) return;
  try {
    appendFileSync(logFile, line + "\n");
  } catch (err) {
    process.stderr.write(
      `[smart-ffmpeg debug] cannot write to ${logFile}: ${err instanceof Error ? err.message : String(err)}\n`
    );
  }
}
