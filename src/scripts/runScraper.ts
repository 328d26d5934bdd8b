#!/usr/bin/env node
import { loadConfig } from "../config/config";
import { StructuralError } from "../errors";
import { ScrapePipeline } from "../services/scraperService";
import { logger } from "../utils/logger";
import { parseArgs } from "./args";

async function main(): Promise<void> {
  const { searchTerm, maxRecords } = parseArgs(process.argv.slice(2));
  const cfg = loadConfig();
  const limit = maxRecords ?? cfg.maxRecords;

  logger.info(`Searching for "${searchTerm}" (max ${limit} records)`);

  const report = await new ScrapePipeline(cfg).run(searchTerm, limit);

  logger.info(
    `Scraping finished. Found: ${report.found}, Returned: ${report.returned}, Failed: ${report.errored}`
  );
  logger.info(`CSV saved to: ${report.files.csvPath}`);
  if (report.files.errorLogPath) {
    logger.warn(`Errors logged to: ${report.files.errorLogPath}`);
  }
  if (!report.complete) {
    logger.warn("Partial result: not every row was enriched with detail data.");
  }
}

main().catch((err: unknown) => {
  if (err instanceof StructuralError) {
    logger.error("Search results table not found, the site layout may have changed", err.message);
  } else {
    logger.error("Fatal error in scraper", err);
  }
  process.exit(1);
});
