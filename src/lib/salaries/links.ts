import type { CheerioAPI } from "cheerio";
import type { LinkEntry, TableSelector } from "../types";
import { selectTable } from "./table";

/** `team=` followed by a three-letter uppercase team code */
export const DEFAULT_LOCATOR_PATTERN = /team=([A-Z]{3})/;

/**
 * Every anchor inside the index table's rows, in document order.
 * Duplicates are kept.
 */
export function extractLinks($: CheerioAPI, selector: TableSelector): LinkEntry[] {
  const table = selectTable($, selector);
  const links: LinkEntry[] = [];
  table.find("tr a").each((_, a) => {
    const link = $(a);
    links.push({
      label: link.text().trim(),
      locator: link.attr("href") ?? "",
    });
  });
  return links;
}

export function extractSourceId(
  locator: string,
  pattern: RegExp = DEFAULT_LOCATOR_PATTERN
): string | null {
  const match = locator.match(pattern);
  return match?.[1] ?? null;
}

export function resolveLink(locator: string, baseUrl: string): string {
  return new URL(locator, baseUrl).toString();
}
