export { config, loadConfig } from "./config/config";
export type { ScraperConfig } from "./config/config";
export * from "./errors";
export * from "./types/BusinessRecord";
export { openBrowserSession, PlaywrightPageFetcher } from "./services/pageFetcher";
export type {
  BrowserSession,
  FetchRequest,
  PageAction,
  PageFetcher,
  RenderedContent,
  SessionFactory
} from "./services/pageFetcher";
export { extractSearchResults, dedupeRecords } from "./services/listingService";
export { extractDetailFields, scrapeBusinessDetail } from "./services/detailService";
export { ScrapePipeline } from "./services/scraperService";
export type { PipelineDeps, ScrapeReport } from "./services/scraperService";
export { exportOutcome, renderCsv } from "./utils/csvExporter";
export type { ExportOptions, ExportResult } from "./utils/csvExporter";
