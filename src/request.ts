import * as os from "os";
import { type DirectoryContext, describeDirectoryContext } from "./context.js";
import { InvalidInputError } from "./errors.js";

export const MEDIA_TOOL = "ffmpeg";

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

export interface CommandRequest {
  readonly instruction: string;
  readonly context?: DirectoryContext;
  readonly messages: readonly ChatMessage[];
}

export interface ShellProfile {
  shell: string;
  quotingRules: string;
}

// Quoting differs enough between shells that the model has to be told which one runs the command.
export function getShellProfile(platform: NodeJS.Platform = os.platform()): ShellProfile {
  if (platform === "win32") {
    return {
      shell: "Windows PowerShell",
      quotingRules:
        "Quote paths containing spaces with double quotes. Do not use POSIX-only constructs such as backslash line continuations or $(...).",
    };
  }
  return {
    shell: "POSIX sh",
    quotingRules:
      "Quote paths containing spaces or shell metacharacters with single quotes, and quote filter graphs that contain ';' or ','.",
  };
}

export function buildSystemInstruction(profile: ShellProfile = getShellProfile()): string {
  return `You are an expert ${MEDIA_TOOL} command generator.
A user describes a media transformation in natural language. Your ONLY task is to convert
this request into a single, valid, efficient ${MEDIA_TOOL} command that runs in ${profile.shell}.

Respond with a JSON object and nothing else:
{
  "command": "the full ${MEDIA_TOOL} command on one line",
  "explanation": "one or two sentences on what the command does"
}

Crucial Rules:
1. "command" MUST be exactly one runnable command line starting with "${MEDIA_TOOL}". No prose,
   no markdown, no line breaks, no chained commands.
2. Do not wrap the JSON in markdown formatting (like \`\`\`json).
3. ${profile.quotingRules}
4. Prefer input files that appear in the directory listing when one is given. Otherwise use
   placeholder names such as input.mp4 and output.mp4.
5. If the request is ambiguous, make a reasonable assumption and state it in "explanation".
6. Never overwrite an input file in place.
`;
}

export function buildCommandRequest(
  instruction: string,
  context?: DirectoryContext,
  profile?: ShellProfile
): CommandRequest {
  const trimmed = instruction.trim();
  if (!trimmed) {
    throw new InvalidInputError("Instruction must not be empty.");
  }

  const userContent = context
    ? `${trimmed}\n\n${describeDirectoryContext(context)}`
    : trimmed;

  const messages: ChatMessage[] = [
    { role: "system", content: buildSystemInstruction(profile) },
    { role: "user", content: userContent },
  ];

  return Object.freeze({
    instruction: trimmed,
    context,
    messages: Object.freeze(messages),
  });
}
