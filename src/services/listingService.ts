import { load } from "cheerio";
import { StructuralError } from "../errors";
import type { SearchRecord } from "../types/BusinessRecord";
import type { RenderedContent } from "./pageFetcher";

export interface ListingOptions {
  resultsTableSelector: string;
  noResultsSelector?: string;
  detailLinkSelector: string;
  nextPageSelector?: string;
  /** Index given to the first row, so later pages continue the sequence. */
  firstIndex?: number;
}

export interface SearchListing {
  /** Field keys in table order, derived from the header cells. */
  columns: string[];
  records: SearchRecord[];
  nextPageUrl: string | null;
}

export function cleanText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** "Entity Information" -> "entityInformation"; blank headers -> column<N>. */
export function toFieldKey(header: string, position: number): string {
  const words = header.split(/[^\p{L}\p{N}]+/u).filter((w) => w.length > 0);
  if (words.length === 0) return `column${position + 1}`;

  return words
    .map((word, i) => {
      const lower = word.toLowerCase();
      return i === 0 ? lower : lower.charAt(0).toUpperCase() + lower.slice(1);
    })
    .join("");
}

function uniqueKeys(keys: string[]): string[] {
  const seen = new Map<string, number>();
  return keys.map((key) => {
    const count = (seen.get(key) ?? 0) + 1;
    seen.set(key, count);
    return count === 1 ? key : `${key}_${count}`;
  });
}

export function resolveReference(href: string | undefined, baseUrl: string): string | null {
  const trimmed = href?.trim();
  if (!trimmed || trimmed.startsWith("#") || /^javascript:/i.test(trimmed)) {
    return null;
  }
  try {
    return new URL(trimmed, baseUrl).toString();
  } catch {
    return null;
  }
}

/**
 * Reads every row of the results table. Unknown columns are kept as-is,
 * so a new column on the site shows up as a new field instead of breaking.
 */
export function extractSearchResults(
  content: RenderedContent,
  opts: ListingOptions
): SearchListing {
  const $ = load(content.html);
  const table = $(opts.resultsTableSelector).first();

  if (table.length === 0) {
    if (opts.noResultsSelector && $(opts.noResultsSelector).length > 0) {
      return { columns: [], records: [], nextPageUrl: null };
    }
    throw new StructuralError(
      opts.resultsTableSelector,
      `Results container "${opts.resultsTableSelector}" not found on ${content.url}`
    );
  }

  let headerCells = table.find("thead tr").first().children("th, td");
  if (headerCells.length === 0) {
    headerCells = table
      .find("tr")
      .filter((_, tr) => $(tr).children("th").length > 0 && $(tr).children("td").length === 0)
      .first()
      .children("th");
  }

  const columns = uniqueKeys(
    headerCells.toArray().map((cell, i) => toFieldKey(cleanText($(cell).text()), i))
  );

  const firstIndex = opts.firstIndex ?? 0;
  const records: SearchRecord[] = [];

  table
    .find("tr")
    .filter((_, tr) => $(tr).closest("thead").length === 0 && $(tr).children("td").length > 0)
    .each((_, tr) => {
      const row = $(tr);
      const fields = new Map<string, string>();

      row.children("th, td").each((i, cell) => {
        const key = columns[i] ?? `column${i + 1}`;
        fields.set(key, cleanText($(cell).text()));
      });

      const href = row.find(opts.detailLinkSelector).first().attr("href");
      records.push({
        index: firstIndex + records.length,
        fields,
        detailReference: resolveReference(href, content.url)
      });
    });

  let nextPageUrl: string | null = null;
  if (opts.nextPageSelector) {
    const next = resolveReference($(opts.nextPageSelector).first().attr("href"), content.url);
    nextPageUrl = next !== null && next !== content.url ? next : null;
  }

  return { columns, records, nextPageUrl };
}

/**
 * Drops rows whose `field` is blank or was already seen, then renumbers
 * the survivors so indexes stay contiguous.
 */
export function dedupeRecords(records: SearchRecord[], field: string): SearchRecord[] {
  const seen = new Set<string>();
  const kept: SearchRecord[] = [];

  for (const record of records) {
    const key = (record.fields.get(field) ?? "").trim();
    if (!key || seen.has(key)) continue;
    seen.add(key);
    kept.push({ ...record, index: kept.length });
  }

  return kept;
}
