/** `value` floored when it is a finite number >= `min`, otherwise `fallback`. */
export function countOr(value: number | undefined, fallback: number, min: number): number {
  return value !== undefined && Number.isFinite(value) && value >= min ? Math.floor(value) : fallback;
}

function envCount(name: string, fallback: number, min: number): number {
  return countOr(parseInt(process.env[name] || "", 10), fallback, min);
}

export const config = {
  indexUrl: process.env.INDEX_URL || "",
  referenceUrl: process.env.REFERENCE_URL || "",
  outputDir: process.env.OUTPUT_DIR || "data/out",
  dbPath: process.env.DB_PATH || "data/payroll.db",
  scrapeDelayMs: envCount("SCRAPE_DELAY_MS", 1000, 0),
  fetchTimeoutMs: envCount("FETCH_TIMEOUT_MS", 15000, 1),
  skipRows: envCount("SKIP_ROWS", 2, 0),
  concurrency: envCount("CONCURRENCY", 1, 1),
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
