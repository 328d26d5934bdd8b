import { describe, it, expect } from "vitest";
import { StructuralError } from "../../errors";
import {
  dedupeRecords,
  extractSearchResults,
  type ListingOptions,
  resolveReference,
  toFieldKey
} from "../listingService";
import { SEARCH_URL, searchPage } from "./fakes";

const options: ListingOptions = {
  resultsTableSelector: "table.div-table",
  noResultsSelector: ".no-results",
  detailLinkSelector: "a[href]"
};

describe("toFieldKey", () => {
  it("camel-cases header text", () => {
    expect(toFieldKey("Entity Information", 0)).toBe("entityInformation");
    expect(toFieldKey("Initial Filing Date", 1)).toBe("initialFilingDate");
    expect(toFieldKey("Entity ID", 2)).toBe("entityId");
  });

  it("falls back to a positional key for blank headers", () => {
    expect(toFieldKey("", 3)).toBe("column4");
    expect(toFieldKey(" - ", 0)).toBe("column1");
  });
});

describe("resolveReference", () => {
  it("resolves relative links against the page URL", () => {
    expect(resolveReference("/details/7", SEARCH_URL)).toBe("https://registry.test/details/7");
  });

  it("ignores fragment and javascript links", () => {
    expect(resolveReference("#", SEARCH_URL)).toBeNull();
    expect(resolveReference("javascript:void(0)", SEARCH_URL)).toBeNull();
    expect(resolveReference(undefined, SEARCH_URL)).toBeNull();
  });
});

describe("extractSearchResults", () => {
  it("reads every row with every column and its detail link", () => {
    const html = searchPage([
      { name: "ACME ONE (C0001)", filed: "01/02/2003", status: "Active", href: "/details/1" },
      { name: "ACME TWO (C0002)", filed: "02/03/2004", status: "Suspended", href: "/details/2" }
    ]);

    const listing = extractSearchResults({ url: SEARCH_URL, html }, options);

    expect(listing.columns).toEqual(["entityInformation", "initialFilingDate", "status"]);
    expect(listing.records).toHaveLength(2);
    expect(listing.records[1].index).toBe(1);
    expect(Array.from(listing.records[1].fields.entries())).toEqual([
      ["entityInformation", "ACME TWO (C0002)"],
      ["initialFilingDate", "02/03/2004"],
      ["status", "Suspended"]
    ]);
    expect(listing.records[0].detailReference).toBe("https://registry.test/details/1");
    expect(listing.nextPageUrl).toBeNull();
  });

  it("keeps columns it has no header for", () => {
    const html = `<table class="div-table">
      <thead><tr><th>Name</th></tr></thead>
      <tbody><tr><td>Widget Co</td><td>  extra
        value </td></tr></tbody>
    </table>`;

    const listing = extractSearchResults({ url: SEARCH_URL, html }, options);

    expect(Array.from(listing.records[0].fields.entries())).toEqual([
      ["name", "Widget Co"],
      ["column2", "extra value"]
    ]);
    expect(listing.records[0].detailReference).toBeNull();
  });

  it("reads the header from a th row when the table has no thead", () => {
    const html = `<table class="div-table">
      <tr><th>Name</th><th>Name</th></tr>
      <tr><td>A</td><td>B</td></tr>
    </table>`;

    const listing = extractSearchResults({ url: SEARCH_URL, html }, options);

    expect(listing.columns).toEqual(["name", "name_2"]);
    expect(listing.records).toHaveLength(1);
    expect(listing.records[0].fields.get("name_2")).toBe("B");
  });

  it("returns no rows for an empty table", () => {
    const listing = extractSearchResults({ url: SEARCH_URL, html: searchPage([]) }, options);

    expect(listing.records).toEqual([]);
    expect(listing.columns).toEqual(["entityInformation", "initialFilingDate", "status"]);
  });

  it("treats the no-results marker as zero rows", () => {
    const html = `<div class="no-results">No matching entities</div>`;

    const listing = extractSearchResults({ url: SEARCH_URL, html }, options);

    expect(listing).toEqual({ columns: [], records: [], nextPageUrl: null });
  });

  it("throws a StructuralError when the results container is missing", () => {
    const html = `<div class="maintenance">Back soon</div>`;

    expect(() => extractSearchResults({ url: SEARCH_URL, html }, options)).toThrow(StructuralError);
  });

  it("continues indexes from firstIndex and reports the next page", () => {
    const html = searchPage(
      [{ name: "ACME", filed: "01/01/2020", status: "Active", href: "/details/9" }],
      `<a class="next" href="/search?page=2">Next</a>`
    );

    const listing = extractSearchResults(
      { url: SEARCH_URL, html },
      { ...options, nextPageSelector: "a.next", firstIndex: 4 }
    );

    expect(listing.records[0].index).toBe(4);
    expect(listing.nextPageUrl).toBe("https://registry.test/search?page=2");
  });
});

describe("dedupeRecords", () => {
  it("drops blank and repeated keys and renumbers", () => {
    const html = searchPage([
      { name: "ACME", filed: "1", status: "Active" },
      { name: "", filed: "2", status: "Active" },
      { name: "ACME", filed: "3", status: "Active" },
      { name: "BETA", filed: "4", status: "Active" }
    ]);
    const { records } = extractSearchResults({ url: SEARCH_URL, html }, options);

    const kept = dedupeRecords(records, "entityInformation");

    expect(kept.map((r) => [r.index, r.fields.get("initialFilingDate")])).toEqual([
      [0, "1"],
      [1, "4"]
    ]);
  });
});
