import { promises as fs } from "fs";
import { join } from "path";

export interface DirectoryEntry {
  name: string;
  size: number;
}

export interface DirectoryContext {
  cwd: string;
  entries: DirectoryEntry[];
  /** Files left out once `limit` was reached. */
  omitted: number;
}

export const DEFAULT_CONTEXT_LIMIT = 40;

export async function collectDirectoryContext(
  cwd: string,
  options: { limit?: number } = {}
): Promise<DirectoryContext> {
  const limit = options.limit ?? DEFAULT_CONTEXT_LIMIT;
  const dirents = await fs.readdir(cwd, { withFileTypes: true });

  const names = dirents
    .filter((d) => d.isFile() && !d.name.startsWith("."))
    .map((d) => d.name)
    .sort((a, b) => a.localeCompare(b));

  const entries: DirectoryEntry[] = [];
  for (const name of names.slice(0, limit)) {
    const stat = await fs.stat(join(cwd, name));
    entries.push({ name, size: stat.size });
  }

  return { cwd, entries, omitted: Math.max(0, names.length - limit) };
}

export function formatSize(bytes: number): string {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

export function describeDirectoryContext(context: DirectoryContext): string {
  if (context.entries.length === 0) {
    return "Files in the current directory: (none)";
  }
  const lines = context.entries.map((e) => `- ${e.name} (${formatSize(e.size)})`);
  if (context.omitted > 0) {
    lines.push(`- ... and ${context.omitted} more`);
  }
  return `Files in the current directory:\n${lines.join("\n")}`;
}
