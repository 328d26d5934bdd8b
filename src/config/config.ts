import * as dotenv from "dotenv";
import { z } from "zod";
import { ConfigurationError } from "../errors";

export interface ScraperConfig {
  searchUrl: string;
  searchInputSelector: string;
  searchButtonSelector: string;
  /** Container of the result rows; its absence means the site layout changed. */
  resultsTableSelector: string;
  /** Marker the site shows instead of the table when nothing matched. */
  noResultsSelector?: string;
  detailLinkSelector: string;
  /** Left unset for single-page result sets. */
  nextPageSelector?: string;
  maxPages: number;
  detailReadySelector: string;
  maxRecords: number;
  searchTimeoutMs: number;
  detailTimeoutMs: number;
  detailDelayMs: number;
  outputDir: string;
  filePrefix: string;
  /** Columns written as ="value" so spreadsheets keep them as text. */
  excelTextColumns: string[];
  /** Search field used to drop blank and repeated rows. */
  dedupeBy?: string;
  headless: boolean;
  userAgent?: string;
}

export const config: ScraperConfig = {
  searchUrl: "https://bizfileonline.sos.ca.gov/search/business",
  searchInputSelector: ".search-input-wrapper input",
  searchButtonSelector: ".search-input-wrapper button",
  resultsTableSelector: "table.div-table",
  noResultsSelector: ".no-results",
  detailLinkSelector: "a[href]",
  maxPages: 1,
  detailReadySelector: "body",
  maxRecords: 500,
  searchTimeoutMs: 60000,
  detailTimeoutMs: 30000,
  detailDelayMs: 1000,
  outputDir: "output",
  filePrefix: "bizfile",
  excelTextColumns: ["search_initialFilingDate"],
  headless: true
};

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const envSchema = z.object({
  SEARCH_URL: z.string().url().optional(),
  MAX_RECORDS: positiveInt.optional(),
  MAX_PAGES: positiveInt.optional(),
  SEARCH_TIMEOUT_MS: positiveInt.optional(),
  DETAIL_TIMEOUT_MS: positiveInt.optional(),
  DETAIL_DELAY_MS: nonNegativeInt.optional(),
  OUTPUT_DIR: z.string().min(1).optional(),
  FILE_PREFIX: z.string().min(1).optional(),
  HEADLESS: z.enum(["true", "false"]).optional(),
  USER_AGENT: z.string().min(1).optional(),
  DEDUPE_BY: z.string().min(1).optional()
});

/**
 * Applies environment overrides on top of the defaults above.
 * `.env` is read only when no explicit env object is passed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = loadDotenv(),
  base: ScraperConfig = config
): ScraperConfig {
  const parsed = envSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError(
      `Invalid environment configuration: ${Array.from(new Set(keys)).join(", ")}`
    );
  }

  const e = parsed.data;
  const merged: ScraperConfig = {
    ...base,
    searchUrl: e.SEARCH_URL ?? base.searchUrl,
    maxRecords: e.MAX_RECORDS ?? base.maxRecords,
    maxPages: e.MAX_PAGES ?? base.maxPages,
    searchTimeoutMs: e.SEARCH_TIMEOUT_MS ?? base.searchTimeoutMs,
    detailTimeoutMs: e.DETAIL_TIMEOUT_MS ?? base.detailTimeoutMs,
    detailDelayMs: e.DETAIL_DELAY_MS ?? base.detailDelayMs,
    outputDir: e.OUTPUT_DIR ?? base.outputDir,
    filePrefix: e.FILE_PREFIX ?? base.filePrefix,
    headless: e.HEADLESS === undefined ? base.headless : e.HEADLESS === "true",
    userAgent: e.USER_AGENT ?? base.userAgent,
    dedupeBy: e.DEDUPE_BY ?? base.dedupeBy
  };

  if (merged.detailTimeoutMs > merged.searchTimeoutMs) {
    throw new ConfigurationError(
      `DETAIL_TIMEOUT_MS (${merged.detailTimeoutMs}) must not exceed SEARCH_TIMEOUT_MS (${merged.searchTimeoutMs})`
    );
  }

  return merged;
}

/** `MAX_RECORDS=` in .env means "use the default", not zero. */
function withoutBlankValues(env: Record<string, string | undefined>): Record<string, string> {
  const kept: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      kept[key] = value;
    }
  }
  return kept;
}

function loadDotenv(): Record<string, string | undefined> {
  dotenv.config();
  return process.env;
}
