import * as cheerio from "cheerio";
import { ProxyAgent, fetch as undiciFetch } from "undici";
import { config } from "../config";
import { FetchError } from "../errors";

export interface FetchOptions {
  retries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  politeDelayMs?: number;
}

export async function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function getProxyDispatcher(): ProxyAgent | undefined {
  const proxyUrl =
    process.env.HTTPS_PROXY ||
    process.env.https_proxy ||
    process.env.HTTP_PROXY ||
    process.env.http_proxy;
  if (!proxyUrl) return undefined;
  return new ProxyAgent(proxyUrl);
}

function isAbort(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/**
 * GET a page and return its body. Any network error, timeout or non-2xx
 * status ends in a FetchError. Retries are off unless `retries` is set, and
 * then only cover 429/503 responses and timeouts.
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<string> {
  const {
    retries = 0,
    retryDelayMs = 2000,
    timeoutMs = config.fetchTimeoutMs,
    politeDelayMs = config.scrapeDelayMs,
  } = options;

  if (politeDelayMs > 0) await delay(politeDelayMs);

  const dispatcher = getProxyDispatcher();

  for (let attempt = 0; attempt <= retries; attempt++) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const fetchOptions: Parameters<typeof undiciFetch>[1] = {
        headers: {
          "User-Agent": config.getRandomUserAgent(),
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
          "Accept-Language": "en-US,en;q=0.9",
        },
        signal: controller.signal,
        dispatcher,
      };

      const response = await undiciFetch(url, fetchOptions);

      if (response.status === 429 || response.status === 503) {
        if (attempt < retries) {
          await delay(retryDelayMs * Math.pow(2, attempt));
          continue;
        }
        throw new FetchError(url, `Rate limited (${response.status}): ${url}`, response.status);
      }

      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status} for ${url}`, response.status);
      }

      return await response.text();
    } catch (error: unknown) {
      if (error instanceof FetchError) throw error;
      if (attempt < retries && isAbort(error)) {
        await delay(retryDelayMs * Math.pow(2, attempt));
        continue;
      }
      const reason = isAbort(error)
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new FetchError(url, `Failed to fetch ${url}: ${reason}`, undefined, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }

  throw new FetchError(url, `Failed to fetch ${url} after ${retries} retries`);
}

export async function fetchDocument(
  url: string,
  options: FetchOptions = {}
): Promise<cheerio.CheerioAPI> {
  const html = await fetchPage(url, options);
  return cheerio.load(html);
}
