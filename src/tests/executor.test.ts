import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { describe, expect, it } from "vitest";
import { ExecutionError, InterruptedError, ToolNotFoundError } from "../errors.js";
import {
  OUTPUT_CAPTURE_LIMIT,
  executeCommand,
  leadingExecutable,
  missingToolName,
} from "../executor.js";
import { memoryStream } from "./helpers.js";

function sinks() {
  const out = memoryStream();
  const err = memoryStream();
  return { out, err, options: { stdout: out.stream, stderr: err.stream } };
}

describe("executeCommand", () => {
  it("streams output to the sinks and returns it", async () => {
    const { out, options } = sinks();

    const result = await executeCommand("printf hello", options);

    expect(result).toEqual({ exitCode: 0, stdout: "hello", stderr: "" });
    expect(out.text()).toBe("hello");
  });

  it("runs in the given working directory", async () => {
    const dir = await fs.mkdtemp(join(tmpdir(), "smart-ffmpeg-exec-"));
    try {
      const result = await executeCommand("pwd -P", { ...sinks().options, cwd: dir });
      expect(result.stdout.trim()).toBe(await fs.realpath(dir));
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it("rejects a non-zero exit with ExecutionError carrying the code", async () => {
    const { err, options } = sinks();

    const failure = await executeCommand("printf oops >&2; exit 3", options).catch(
      (e: unknown) => e
    );

    expect(failure).toBeInstanceOf(ExecutionError);
    expect(failure).toMatchObject({
      exitCode: 3,
      result: { exitCode: 3, stdout: "", stderr: "oops" },
    });
    expect(err.text()).toBe("oops");
  });

  it("reports termination by signal as 128 + signal number", async () => {
    const failure = await executeCommand("kill -TERM $$", sinks().options).catch(
      (e: unknown) => e
    );

    expect(failure).toBeInstanceOf(ExecutionError);
    expect(failure).toMatchObject({ exitCode: 143 });
  });

  it("raises ToolNotFoundError for a missing executable", async () => {
    const failure = await executeCommand(
      "definitely-not-installed-tool-xyz -i in.mp4 out.mp3",
      sinks().options
    ).catch((e: unknown) => e);

    expect(failure).toBeInstanceOf(ToolNotFoundError);
    expect(failure).toMatchObject({ tool: "definitely-not-installed-tool-xyz", exitCode: 127 });
  });

  it("reports a missing working directory as an ExecutionError", async () => {
    const cwd = join(tmpdir(), "smart-ffmpeg-no-such-dir-4f1c");

    const failure = await executeCommand("printf never", { ...sinks().options, cwd }).catch(
      (e: unknown) => e
    );

    expect(failure).toBeInstanceOf(ExecutionError);
    expect(failure).not.toBeInstanceOf(ToolNotFoundError);
    expect(failure).toMatchObject({
      exitCode: 1,
      result: { stderr: expect.stringContaining("ENOENT") },
    });
  });

  it("keeps only the tail of long output while streaming all of it", async () => {
    const { out, options } = sinks();

    const result = await executeCommand("yes a | head -c 70000", options);

    expect(out.text().length).toBe(70000);
    expect(result.stdout.length).toBe(OUTPUT_CAPTURE_LIMIT);
    expect(result.stdout).toBe(out.text().slice(-OUTPUT_CAPTURE_LIMIT));
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      executeCommand("printf never", { ...sinks().options, signal: controller.signal })
    ).rejects.toBeInstanceOf(InterruptedError);
  });

  it("kills the child when aborted", async () => {
    const controller = new AbortController();
    const running = executeCommand("exec sleep 5", {
      ...sinks().options,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 50);

    await expect(running).rejects.toBeInstanceOf(InterruptedError);
  });
});

describe("leadingExecutable", () => {
  it("skips variable assignments and quotes", () => {
    expect(leadingExecutable("FFREPORT=1 ffmpeg -i a.mp4 b.mp4")).toBe("ffmpeg");
    expect(leadingExecutable('"ffmpeg" -i a.mp4 b.mp4')).toBe("ffmpeg");
  });
});

describe("missingToolName", () => {
  it("reads the tool from the shell's message", () => {
    expect(missingToolName("ffmpeg -i a b | lame -", "sh: 1: lame: not found\n")).toBe("lame");
    expect(missingToolName("ffmpeg -i a b", "bash: line 1: ffmpeg: command not found\n")).toBe(
      "ffmpeg"
    );
  });

  it("falls back to the first word", () => {
    expect(missingToolName("ffmpeg -i a b", "")).toBe("ffmpeg");
  });
});
