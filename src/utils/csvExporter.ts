import * as fs from "fs";
import * as path from "path";
import { stringify } from "csv-stringify/sync";
import { ExportError } from "../errors";
import type { CombinedRecord, ScrapeError, ScrapeOutcome } from "../types/BusinessRecord";
import { logger } from "./logger";

export const SEARCH_PREFIX = "search_";
export const DETAIL_PREFIX = "detail_";

export interface ExportOptions {
  filePrefix: string;
  /** Non-empty values in these columns are written as ="value". */
  excelTextColumns?: readonly string[];
}

export interface ExportResult {
  csvPath: string;
  /** Null when the run had no errors. */
  errorLogPath: string | null;
  rowCount: number;
}

/** Letters and digits survive, everything else becomes "_". */
export function safeFileStem(searchTerm: string): string {
  const stem = searchTerm.replace(/[^\p{L}\p{N}]/gu, "_").replace(/^_+|_+$/g, "");
  return stem || "results";
}

export function outputPaths(
  outputDir: string,
  searchTerm: string,
  filePrefix: string
): { csvPath: string; errorLogPath: string } {
  const base = `${filePrefix}_${safeFileStem(searchTerm)}`;
  return {
    csvPath: path.join(outputDir, `${base}.csv`),
    errorLogPath: path.join(outputDir, `${base}_errors.txt`)
  };
}

export function flattenRecord(record: CombinedRecord): Map<string, string> {
  const flat = new Map<string, string>();
  for (const [key, value] of record.search.fields) {
    flat.set(`${SEARCH_PREFIX}${key}`, value);
  }
  for (const [key, value] of record.detail) {
    flat.set(`${DETAIL_PREFIX}${key}`, value);
  }
  return flat;
}

/**
 * Table columns first, in table order, then any other key in the order it
 * first appears across the rows.
 */
export function buildColumns(outcome: ScrapeOutcome, rows: Map<string, string>[]): string[] {
  const columns = new Set<string>(outcome.searchColumns.map((c) => `${SEARCH_PREFIX}${c}`));
  for (const row of rows) {
    for (const key of row.keys()) {
      columns.add(key);
    }
  }
  return Array.from(columns);
}

export function renderCsv(outcome: ScrapeOutcome, options: ExportOptions): string {
  const rows = outcome.records.map(flattenRecord);
  const columns = buildColumns(outcome, rows);
  if (columns.length === 0) return "";

  const textColumns = new Set(options.excelTextColumns ?? []);
  const body = rows.map((row) =>
    columns.map((column) => {
      const value = (row.get(column) ?? "").trim();
      return value && textColumns.has(column) ? `="${value}"` : value;
    })
  );

  return stringify([columns, ...body]);
}

const flattenWhitespace = (value: string): string => value.replace(/[\t\r\n]+/g, " ");

export function formatErrorLine(error: ScrapeError): string {
  return [
    error.timestamp,
    error.index === null ? "-" : String(error.index),
    error.reference,
    error.message
  ]
    .map(flattenWhitespace)
    .join("\t");
}

export function renderErrorLog(errors: readonly ScrapeError[]): string {
  return errors.map((e) => `${formatErrorLine(e)}\n`).join("");
}

async function writeOrFail(filePath: string, data: string): Promise<void> {
  try {
    await fs.promises.writeFile(filePath, data, "utf-8");
  } catch (err) {
    throw new ExportError(filePath, { cause: err });
  }
}

/**
 * Writes the CSV for a run and, when it had errors, the error log beside it.
 * Only an unwritable destination fails; record contents never do.
 */
export async function exportOutcome(
  outcome: ScrapeOutcome,
  outputDir: string,
  options: ExportOptions
): Promise<ExportResult> {
  const { csvPath, errorLogPath } = outputPaths(outputDir, outcome.searchTerm, options.filePrefix);

  try {
    await fs.promises.mkdir(outputDir, { recursive: true });
  } catch (err) {
    throw new ExportError(outputDir, { cause: err });
  }

  await writeOrFail(csvPath, renderCsv(outcome, options));
  logger.info(`Wrote ${outcome.records.length} rows to ${csvPath}`);

  if (outcome.errors.length === 0) {
    try {
      await fs.promises.rm(errorLogPath, { force: true });
    } catch (err) {
      throw new ExportError(errorLogPath, { cause: err });
    }
    return { csvPath, errorLogPath: null, rowCount: outcome.records.length };
  }

  await writeOrFail(errorLogPath, renderErrorLog(outcome.errors));
  logger.info(`Wrote ${outcome.errors.length} errors to ${errorLogPath}`);
  return { csvPath, errorLogPath, rowCount: outcome.records.length };
}
