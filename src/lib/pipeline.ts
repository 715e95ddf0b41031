import { config, countOr } from "./config";
import { errorMessage, ScrapeError } from "./errors";
import { fetchDocument, type FetchOptions } from "./scraping/utils";
import { aggregate } from "./salaries/dataset";
import { DEFAULT_LOCATOR_PATTERN, extractLinks, extractSourceId, resolveLink } from "./salaries/links";
import { DEFAULT_COLUMNS, normalize } from "./salaries/normalize";
import { parseTable } from "./salaries/table";
import type {
  ColumnMap,
  NameRejection,
  NormalizeResult,
  NormalizedRecord,
  PipelineResult,
  SourceFailure,
  SourcePage,
  TableSelector,
} from "./types";

export const DEFAULT_SELECTOR: TableSelector = { tag: "table", className: "tablesorter" };

export interface PipelineOptions {
  indexUrl: string;
  selector?: TableSelector;
  skipRows?: number;
  columns?: ColumnMap;
  locatorPattern?: RegExp;
  /** Abort the whole run on the first failed page instead of recording it. */
  failFast?: boolean;
  concurrency?: number;
  fetchOptions?: FetchOptions;
}

type ResolvedOptions = Required<Omit<PipelineOptions, "indexUrl">>;

/** Fetch, parse and normalize one team page. */
export async function scrapeSource(
  page: SourcePage,
  options: Pick<ResolvedOptions, "selector" | "skipRows" | "columns" | "fetchOptions">
): Promise<NormalizeResult> {
  const $ = await fetchDocument(page.url, options.fetchOptions);
  const table = parseTable($, options.selector, { skipRows: options.skipRows });
  const result = normalize(table, page.sourceId, { columns: options.columns });
  console.log(`[${page.sourceId}] ${result.records.length} rows from ${page.url}`);
  return result;
}

export async function runSalaryPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const opts: ResolvedOptions = {
    selector: options.selector ?? DEFAULT_SELECTOR,
    skipRows: countOr(options.skipRows, config.skipRows, 0),
    columns: options.columns ?? DEFAULT_COLUMNS,
    locatorPattern: options.locatorPattern ?? DEFAULT_LOCATOR_PATTERN,
    failFast: options.failFast ?? false,
    concurrency: countOr(options.concurrency, config.concurrency, 1),
    fetchOptions: options.fetchOptions ?? {},
  };

  const startTime = Date.now();
  const failures: SourceFailure[] = [];
  const rejections: NameRejection[] = [];

  console.log(`[pipeline] Fetching index ${options.indexUrl}`);
  const index = await fetchDocument(options.indexUrl, opts.fetchOptions);
  const links = extractLinks(index, opts.selector);
  console.log(`[pipeline] Found ${links.length} links on index page`);

  const sources: SourcePage[] = [];
  const claimed = new Set<string>();
  for (const link of links) {
    const sourceId = extractSourceId(link.locator, opts.locatorPattern);
    const url = URL.canParse(link.locator, options.indexUrl)
      ? resolveLink(link.locator, options.indexUrl)
      : null;
    if (!sourceId || !url) {
      const error = `Unusable link "${link.locator}" (${link.label})`;
      if (opts.failFast) throw new ScrapeError(error);
      console.warn(`[pipeline] ${error}`);
      failures.push({ sourceId: null, url: link.locator, error });
      continue;
    }
    if (claimed.has(sourceId)) {
      console.warn(`[pipeline] Skipping repeated link for ${sourceId} (${link.label})`);
      continue;
    }
    claimed.add(sourceId);
    sources.push({ sourceId, label: link.label, url });
  }

  // Each source id owns exactly one slot.
  const groups = new Map<string, NormalizedRecord[]>();

  for (let i = 0; i < sources.length; i += opts.concurrency) {
    const batch = sources.slice(i, i + opts.concurrency);
    const results = await Promise.allSettled(batch.map((page) => scrapeSource(page, opts)));

    for (let j = 0; j < results.length; j++) {
      const page = batch[j];
      const result = results[j];
      if (result.status === "fulfilled") {
        groups.set(page.sourceId, result.value.records);
        rejections.push(...result.value.rejections);
        continue;
      }
      if (opts.failFast) throw result.reason;
      const error = errorMessage(result.reason);
      console.error(`[pipeline] Failed ${page.sourceId}: ${error}`);
      failures.push({ sourceId: page.sourceId, url: page.url, error });
    }
  }

  const dataset = aggregate(groups);
  groups.clear();

  for (const r of rejections) {
    console.warn(`[pipeline] ${r.sourceId} row ${r.row}: name replaced (${r.reason})`);
  }

  const scraped = sources.length - failures.filter((f) => f.sourceId !== null).length;
  console.log(
    `[pipeline] ${dataset.length} rows from ${scraped}/${sources.length} teams in ${Date.now() - startTime}ms`
  );

  return { dataset, sources, failures, rejections };
}
