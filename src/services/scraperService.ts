import { setTimeout as delay } from "timers/promises";
import type { ScraperConfig } from "../config/config";
import { ConfigurationError, ExportError, StructuralError, toErrorMessage } from "../errors";
import {
  createScrapeError,
  EMPTY_DETAIL,
  type CombinedRecord,
  type PipelineState,
  type ScrapeError,
  type ScrapeOutcome,
  type SearchRecord
} from "../types/BusinessRecord";
import { exportOutcome, type ExportResult } from "../utils/csvExporter";
import { logger } from "../utils/logger";
import { scrapeBusinessDetail } from "./detailService";
import { dedupeRecords, extractSearchResults } from "./listingService";
import {
  openBrowserSession,
  type PageAction,
  type PageFetcher,
  type SessionFactory
} from "./pageFetcher";

export interface ScrapeReport extends ScrapeOutcome {
  files: ExportResult;
}

export interface PipelineDeps {
  openSession?: SessionFactory;
  exporter?: (outcome: ScrapeOutcome) => Promise<ExportResult>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  onStateChange?: (state: PipelineState) => void;
}

interface RunState {
  searchTerm: string;
  maxRecords: number;
  searchColumns: string[];
  found: number;
  records: CombinedRecord[];
  errors: ScrapeError[];
}

interface SearchResults {
  columns: string[];
  records: SearchRecord[];
}

/**
 * Search once, then visit each result's detail page one at a time.
 * Every run ends with an export of whatever was collected, including runs
 * that failed in the search phase.
 */
export class ScrapePipeline {
  private readonly openSession: SessionFactory;
  private readonly exporter: (outcome: ScrapeOutcome) => Promise<ExportResult>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly onStateChange?: (state: PipelineState) => void;

  constructor(private readonly cfg: ScraperConfig, deps: PipelineDeps = {}) {
    this.openSession = deps.openSession ?? (() => openBrowserSession(cfg));
    this.exporter =
      deps.exporter ??
      ((outcome) =>
        exportOutcome(outcome, cfg.outputDir, {
          filePrefix: cfg.filePrefix,
          excelTextColumns: cfg.excelTextColumns
        }));
    this.sleep = deps.sleep ?? ((ms) => delay(ms));
    this.now = deps.now ?? (() => new Date());
    this.onStateChange = deps.onStateChange;
  }

  async run(searchTerm: string, maxRecords: number = this.cfg.maxRecords): Promise<ScrapeReport> {
    const term = searchTerm.trim();
    if (!term) {
      throw new ConfigurationError("Search term must not be empty");
    }
    if (!Number.isInteger(maxRecords) || maxRecords < 1) {
      throw new ConfigurationError(`maxRecords must be a positive integer, got ${maxRecords}`);
    }

    const state: RunState = {
      searchTerm: term,
      maxRecords,
      searchColumns: [],
      found: 0,
      records: [],
      errors: []
    };

    this.transition({ kind: "idle" });
    let failure: { error: unknown } | null = null;

    try {
      await this.withSession((fetcher) => this.collect(fetcher, state));
    } catch (err) {
      failure = { error: err };
      logger.error(`Search phase failed for "${term}": ${toErrorMessage(err)}`);
      state.errors.push(
        createScrapeError(
          { index: null, reference: this.cfg.searchUrl, message: toErrorMessage(err), phase: "search" },
          this.now
        )
      );
    }

    this.transition({ kind: "finalizing" });
    const outcome = buildOutcome(state);
    const files = await this.exporter(outcome).catch((err: unknown) =>
      this.exportFailed(err, failure, outcome)
    );
    this.transition({ kind: "done" });

    logger.info(
      `Run for "${term}" finished. Found: ${outcome.found}, Returned: ${outcome.returned}, Failed: ${outcome.errored}`
    );

    if (failure) {
      if (failure.error instanceof StructuralError) {
        failure.error.outcome = outcome;
      }
      throw failure.error;
    }

    return { ...outcome, files };
  }

  /** Keeps an earlier run failure reachable from the export error that ends the run. */
  private exportFailed(err: unknown, failure: { error: unknown } | null, outcome: ScrapeOutcome): never {
    if (failure) {
      logger.error(
        `Export failed after the run had already failed: ${toErrorMessage(failure.error)}`
      );
      if (failure.error instanceof StructuralError) {
        failure.error.outcome = outcome;
      }
      if (err instanceof ExportError) {
        err.runFailure = failure.error;
      }
    }
    throw err;
  }

  private async withSession(fn: (fetcher: PageFetcher) => Promise<void>): Promise<void> {
    const session = await this.openSession();
    try {
      await fn(session.fetcher);
    } finally {
      try {
        await session.close();
      } catch (err) {
        logger.warn(`Failed to close browser session: ${toErrorMessage(err)}`);
      }
    }
  }

  private async collect(fetcher: PageFetcher, state: RunState): Promise<void> {
    this.transition({ kind: "searching" });
    const results = await this.search(fetcher, state);
    state.searchColumns = results.columns;
    state.found = results.records.length;

    const limit = Math.min(results.records.length, state.maxRecords);
    if (results.records.length > state.maxRecords) {
      logger.info(
        `Found ${results.records.length} rows, enriching only the first ${state.maxRecords}`
      );
    }

    for (let i = 0; i < limit; i++) {
      const row = results.records[i];
      this.transition({ kind: "detailFetching", index: i, total: limit });

      if (this.cfg.detailDelayMs > 0) {
        await this.sleep(this.cfg.detailDelayMs);
      }

      try {
        const detail = await scrapeBusinessDetail(fetcher, row.detailReference, this.cfg);
        state.records.push({ search: row, detail });
        logger.info(`Processed ${i + 1}/${limit}`);
      } catch (err) {
        const message = toErrorMessage(err);
        state.records.push({ search: row, detail: EMPTY_DETAIL });
        state.errors.push(
          createScrapeError(
            { index: row.index, reference: row.detailReference ?? "", message, phase: "detail" },
            this.now
          )
        );
        logger.error(`Failed to scrape record ${i + 1}/${limit}: ${message}`);
      }
    }
  }

  private async search(fetcher: PageFetcher, state: RunState): Promise<SearchResults> {
    const cfg = this.cfg;
    // at least one row, or the explicit no-results marker
    const waitFor = [`${cfg.resultsTableSelector} tbody tr`, cfg.noResultsSelector]
      .filter((s): s is string => Boolean(s))
      .join(", ");

    let url = cfg.searchUrl;
    let actions: PageAction[] = [
      { kind: "fill", selector: cfg.searchInputSelector, value: state.searchTerm },
      { kind: "click", selector: cfg.searchButtonSelector }
    ];
    let columns: string[] = [];
    let records: SearchRecord[] = [];

    logger.info(`Searching for: ${state.searchTerm}`);

    for (let pageIndex = 1; pageIndex <= cfg.maxPages; pageIndex++) {
      const listing = await fetcher
        .fetch({ url, waitFor, timeoutMs: cfg.searchTimeoutMs, actions })
        .then((content) =>
          extractSearchResults(content, {
            resultsTableSelector: cfg.resultsTableSelector,
            noResultsSelector: cfg.noResultsSelector,
            detailLinkSelector: cfg.detailLinkSelector,
            nextPageSelector: cfg.nextPageSelector,
            firstIndex: records.length
          })
        )
        .catch((err: unknown) => this.searchPageFailed(err, pageIndex, url, records.length, state));
      if (listing === null) break;

      if (columns.length === 0) columns = listing.columns;
      records = records.concat(listing.records);
      logger.info(`Found ${listing.records.length} rows on results page #${pageIndex}`);

      if (!listing.nextPageUrl) break;
      if (!cfg.dedupeBy && records.length >= state.maxRecords) {
        logger.info(`Collected ${records.length} rows, not following further pages`);
        break;
      }
      url = listing.nextPageUrl;
      actions = [];
    }

    if (cfg.dedupeBy) {
      const before = records.length;
      records = dedupeRecords(records, cfg.dedupeBy);
      logger.info(`Using ${records.length} of ${before} rows after dedupe on "${cfg.dedupeBy}"`);
    }

    return { columns, records };
  }

  /** The first page is fatal; a later page that fails to load or parse only ends pagination. */
  private searchPageFailed(
    err: unknown,
    pageIndex: number,
    url: string,
    collected: number,
    state: RunState
  ): null {
    if (pageIndex === 1) {
      if (err instanceof StructuralError) throw err;
      throw new StructuralError(
        this.cfg.resultsTableSelector,
        `Search results did not load: ${toErrorMessage(err)}`,
        { cause: err }
      );
    }
    logger.warn(`Results page #${pageIndex} failed, keeping ${collected} rows`);
    state.errors.push(
      createScrapeError(
        { index: null, reference: url, message: toErrorMessage(err), phase: "search" },
        this.now
      )
    );
    return null;
  }

  private transition(state: PipelineState): void {
    logger.debug(
      state.kind === "detailFetching"
        ? `Pipeline state: ${state.kind}(${state.index}/${state.total})`
        : `Pipeline state: ${state.kind}`
    );
    this.onStateChange?.(state);
  }
}

function buildOutcome(state: RunState): ScrapeOutcome {
  const returned = state.records.length;
  const expected = Math.min(state.found, state.maxRecords);
  return {
    searchTerm: state.searchTerm,
    records: state.records,
    errors: state.errors,
    searchColumns: state.searchColumns,
    found: state.found,
    returned,
    errored: state.errors.length,
    complete: state.errors.length === 0 && returned === expected
  };
}
