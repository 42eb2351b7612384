import { promises as fs } from "fs";
import { join } from "path";
import { homedir } from "os";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { debug } from "./logger.js";

export const DEFAULT_MODEL = "google/gemini-2.0-flash-001";
export const DEFAULT_BASE_URL = "https://openrouter.ai/api/v1";
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_MAX_RETRIES = 2;

export const CONFIG_PATH = join(homedir(), ".smart-ffmpeg", "config.json");

const storedConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export type StoredConfig = z.infer<typeof storedConfigSchema>;

export interface AppConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly includeContext: boolean;
}

export interface ConfigOverrides {
  model?: string;
  includeContext?: boolean;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  overrides?: ConfigOverrides;
}

// A missing or unreadable file is treated as an empty config.
export async function getStoredConfig(
  configPath: string = CONFIG_PATH
): Promise<StoredConfig> {
  let data: string;
  try {
    data = await fs.readFile(configPath, "utf-8");
  } catch {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch (err) {
    throw new ConfigurationError(`Config file ${configPath} is not valid JSON.`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = storedConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Config file ${configPath} is invalid: ${issue.path.join(".") || "(root)"} ${issue.message}`
    );
  }
  return parsed.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const stored = await getStoredConfig(options.configPath);

  const apiKey = nonEmpty(env.OPENROUTER_API_KEY) ?? stored.apiKey;
  if (!apiKey) {
    throw new ConfigurationError(
      "OPENROUTER_API_KEY not found. Set it in a .env file or export it in your shell."
    );
  }

  const config: AppConfig = Object.freeze({
    apiKey,
    model:
      nonEmpty(options.overrides?.model) ??
      nonEmpty(env.OPENROUTER_MODEL) ??
      stored.model ??
      DEFAULT_MODEL,
    baseUrl: nonEmpty(env.OPENROUTER_BASE_URL) ?? stored.baseUrl ?? DEFAULT_BASE_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    maxRetries: DEFAULT_MAX_RETRIES,
    includeContext: options.overrides?.includeContext ?? true,
  });

  debug("config loaded", {
    model: config.model,
    baseUrl: config.baseUrl,
    apiKeySource: nonEmpty(env.OPENROUTER_API_KEY) ? "env" : "config-file",
    includeContext: config.includeContext,
  });
  return config;
}
