import fs from "node:fs/promises";
import path from "node:path";

function withTrailingNewline(payload: string): string {
  return payload.endsWith("\n") ? payload : `${payload}\n`;
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Writes beside the target, then renames over it. */
export async function writeTextFile(filePath: string, contents: string): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(tempPath, withTrailingNewline(contents), "utf8");
  await fs.rename(tempPath, filePath);
}

export async function writeJsonFile(
  filePath: string,
  data: unknown,
  { pretty = true }: { pretty?: boolean } = {},
): Promise<void> {
  const json = pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
  await writeTextFile(filePath, json);
}

/** Parsed JSON, or `fallback` when the file does not exist. */
export async function readJsonFile(filePath: string, fallback: unknown = null): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) {
      return fallback;
    }
    throw error;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new Error(`Invalid JSON in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}
