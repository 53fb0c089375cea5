import { ProxyAgent, setGlobalDispatcher } from "undici";

const DEFAULT_UPSTREAM = "https://api.sleeper.app";

const proxyUrl =
  process.env.HTTPS_PROXY ??
  process.env.https_proxy ??
  process.env.HTTP_PROXY ??
  process.env.http_proxy ??
  null;

if (proxyUrl) {
  try {
    setGlobalDispatcher(new ProxyAgent(proxyUrl));
  } catch (error) {
    console.warn(`Failed to configure proxy agent for ${proxyUrl}: ${String(error)}`);
  }
}

const MAX_RETRIES = 3;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function normalizePath(path: string): string {
  return path.startsWith("/") ? path : `/${path}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function buildUrl(path: string, base = DEFAULT_UPSTREAM): URL {
  return new URL(`${base.replace(/\/+$/, "")}${normalizePath(path)}`);
}

function isRetryable(status: number): boolean {
  return status >= 500 || status === 429;
}

/** GET/POST returning parsed JSON; 5xx and 429 are retried with linear backoff. */
export async function requestJson(url: string | URL, init: RequestInit = {}): Promise<unknown> {
  const target = typeof url === "string" ? url : url.toString();
  const headers = new Headers(init.headers || {});
  headers.set("Accept", "application/json");

  for (let attempt = 0; attempt < MAX_RETRIES; attempt += 1) {
    const response = await fetch(target, { ...init, headers });
    const bodyText = await response.text().catch(() => "");

    if (response.ok) {
      if (!bodyText) {
        return {};
      }
      try {
        const parsed: unknown = JSON.parse(bodyText);
        return parsed;
      } catch (error) {
        const snippet = bodyText.slice(0, 300).replace(/\s+/g, " ");
        throw new Error(`Failed to parse JSON from ${target}: ${describeError(error)}: ${snippet}`);
      }
    }

    const snippet = bodyText.slice(0, 300).replace(/\s+/g, " ");
    if (isRetryable(response.status) && attempt < MAX_RETRIES - 1) {
      await wait(400 * (attempt + 1));
      continue;
    }

    throw new Error(`Network error for ${target}: ${response.status} ${response.statusText}: ${snippet}`);
  }

  throw new Error(`Retries exhausted for ${target}`);
}
