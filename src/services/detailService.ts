import { load } from "cheerio";
import { DetailFetchError, toErrorMessage } from "../errors";
import type { DetailRecord } from "../types/BusinessRecord";
import { logger } from "../utils/logger";
import { cleanText } from "./listingService";
import type { PageFetcher } from "./pageFetcher";

export const DETAIL_URL_FIELD = "detail_url";

const LABEL_SELECTOR = "label, .label, .field-label, dt";

export interface DetailOptions {
  detailReadySelector: string;
  detailTimeoutMs: number;
}

function stripLabelColon(label: string): string {
  return label.replace(":", "").trim();
}

/**
 * Collects every label/value pair on a detail page. A `dt` takes its own
 * `dd`; any other label takes the text of its next element sibling, or
 * failing that its parent's text minus the label itself. Repeated labels
 * with new values are joined with " || ".
 */
export function extractDetailFields(html: string, detailUrl: string): DetailRecord {
  const $ = load(html);
  const fields = new Map<string, string>();

  const put = (label: string, value: string): void => {
    if (!label || !value || label === DETAIL_URL_FIELD) return;
    const existing = fields.get(label);
    if (existing === undefined) {
      fields.set(label, value);
    } else if (!existing.split(" || ").includes(value)) {
      fields.set(label, `${existing} || ${value}`);
    }
  };

  $(LABEL_SELECTOR).each((_, el) => {
    const node = $(el);
    const rawLabel = cleanText(node.text());
    const label = stripLabelColon(rawLabel);
    if (!label) return;

    const next = node.next();
    let value: string;
    if (node.is("dt")) {
      // only the dd that belongs to this dt, never one past the next dt
      value = cleanText(node.nextUntil("dt", "dd").first().text());
    } else if (next.length > 0) {
      value = cleanText(next.text());
    } else {
      value = cleanText(node.parent().text())
        .replace(rawLabel, "")
        .replace(/^\s*:/, "")
        .trim();
    }

    put(label, value);
  });

  fields.set(DETAIL_URL_FIELD, detailUrl);
  return fields;
}

export async function scrapeBusinessDetail(
  fetcher: PageFetcher,
  reference: string | null,
  opts: DetailOptions
): Promise<DetailRecord> {
  if (!reference) {
    throw new DetailFetchError(null, "row has no detail link");
  }

  logger.info(`Scraping detail page: ${reference}`);

  try {
    const content = await fetcher.fetch({
      url: reference,
      waitFor: opts.detailReadySelector,
      timeoutMs: opts.detailTimeoutMs
    });
    return extractDetailFields(content.html, reference);
  } catch (err) {
    throw new DetailFetchError(reference, toErrorMessage(err), { cause: err });
  }
}
