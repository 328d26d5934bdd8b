/** Field name to value, iterated in extraction order. */
export type FieldMap = ReadonlyMap<string, string>;

export interface SearchRecord {
  /** Zero-based position in the search result sequence. */
  readonly index: number;
  readonly fields: FieldMap;
  /** Absolute URL of the entity's detail page, when the row links to one. */
  readonly detailReference: string | null;
}

/**
 * Whatever labelled fields the detail page exposes, plus `detail_url`.
 * An empty map stands in for a detail page that could not be extracted.
 */
export type DetailRecord = FieldMap;

export interface CombinedRecord {
  readonly search: SearchRecord;
  readonly detail: DetailRecord;
}

export type ScrapePhase = "search" | "detail";

export interface ScrapeError {
  /** Row index for detail failures, null when the search phase itself failed. */
  readonly index: number | null;
  readonly reference: string;
  readonly message: string;
  readonly phase: ScrapePhase;
  readonly timestamp: string;
}

export interface ScrapeOutcome {
  readonly searchTerm: string;
  readonly records: readonly CombinedRecord[];
  readonly errors: readonly ScrapeError[];
  /** Result table column keys in table order, known even with zero rows. */
  readonly searchColumns: readonly string[];
  readonly found: number;
  readonly returned: number;
  readonly errored: number;
  readonly complete: boolean;
}

export type PipelineState =
  | { kind: "idle" }
  | { kind: "searching" }
  | { kind: "detailFetching"; index: number; total: number }
  | { kind: "finalizing" }
  | { kind: "done" };

export const EMPTY_DETAIL: DetailRecord = new Map<string, string>();

export function createScrapeError(
  fields: Omit<ScrapeError, "timestamp">,
  now: () => Date = () => new Date()
): ScrapeError {
  return Object.freeze({ ...fields, timestamp: now().toISOString() });
}
