import { mkdir, readFile, rename, stat, writeFile } from "fs/promises";
import path from "path";

export const DEFAULT_TTL_MS = 20 * 60 * 1000;

interface CacheEnvelope {
  cachedAt: string;
  value: unknown;
}

export interface CacheOptions {
  cacheDir: string;
  ttlMs?: number;
}

function keyToPath(cacheDir: string, key: string): string {
  const safeKey = key.replace(/[^a-zA-Z0-9_-]+/g, "-");
  return path.join(cacheDir, `${safeKey}.json`);
}

function isEnvelope(value: unknown): value is CacheEnvelope {
  return (
    typeof value === "object" &&
    value !== null &&
    "cachedAt" in value &&
    typeof value.cachedAt === "string" &&
    "value" in value
  );
}

async function isFresh(filePath: string, ttlMs: number): Promise<boolean> {
  try {
    const stats = await stat(filePath);
    return Date.now() - stats.mtimeMs <= ttlMs;
  } catch {
    return false;
  }
}

export async function readCache(cacheDir: string, key: string): Promise<CacheEnvelope | null> {
  const filePath = keyToPath(cacheDir, key);
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isEnvelope(parsed) ? parsed : null;
  } catch (error) {
    console.warn(`Ignoring unreadable cache entry ${filePath}: ${String(error)}`);
    return null;
  }
}

export async function writeCache(cacheDir: string, key: string, value: unknown): Promise<void> {
  const filePath = keyToPath(cacheDir, key);
  const envelope: CacheEnvelope = {
    cachedAt: new Date().toISOString(),
    value,
  };
  const tempPath = `${filePath}.tmp`;
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(tempPath, `${JSON.stringify(envelope)}\n`, "utf8");
  await rename(tempPath, filePath);
}

/**
 * `USE_FEED_CACHE=1` serves only from disk (offline runs); `NO_CACHE=1`
 * always refetches but still refreshes the entry.
 */
export async function withCache(
  key: string,
  options: CacheOptions,
  fetcher: () => Promise<unknown>,
): Promise<unknown> {
  const { cacheDir } = options;
  const ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;

  if (process.env.USE_FEED_CACHE === "1") {
    const cached = await readCache(cacheDir, key);
    if (!cached) {
      throw new Error(`USE_FEED_CACHE=1 but cache missing for ${key} in ${cacheDir}`);
    }
    return cached.value;
  }

  if (process.env.NO_CACHE !== "1" && (await isFresh(keyToPath(cacheDir, key), ttlMs))) {
    const cached = await readCache(cacheDir, key);
    if (cached) {
      return cached.value;
    }
  }

  const fresh = await fetcher();
  await writeCache(cacheDir, key, fresh);
  return fresh;
}
