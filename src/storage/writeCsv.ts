import { createObjectCsvStringifier } from "csv-writer";
import type { Opportunity } from "../transform/schema.js";
import type { Logger } from "../util/logger.js";
import { writeOutputFile } from "./outputFile.js";

export const CSV_FILE_NAME = "opportunities.csv";

/** Joins `keywords_matched`; split on it to recover the keyword list. */
export const KEYWORD_DELIMITER = "; ";

/** Fixed export column order. */
export const CSV_COLUMNS = [
  "id",
  "title",
  "solicitation_number",
  "agency",
  "posted_date",
  "response_deadline",
  "naics_code",
  "award_amount",
  "place_of_performance",
  "description",
  "contact_name",
  "contact_email",
  "contact_phone",
  "url",
  "keywords_matched",
  "relevance",
  "service_type",
  "source",
  "sector",
  "opportunity_type",
  "status",
  "is_new",
  "notes",
] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

export function toCsvRow(opp: Opportunity): Record<CsvColumn, string> {
  return {
    id: opp.id,
    title: opp.title,
    solicitation_number: opp.solicitationNumber,
    agency: opp.agency,
    posted_date: opp.postedDate,
    response_deadline: opp.responseDeadline,
    naics_code: opp.naicsCode,
    award_amount: String(opp.awardAmount),
    place_of_performance: opp.placeOfPerformance,
    description: opp.description,
    contact_name: opp.contactName,
    contact_email: opp.contactEmail,
    contact_phone: opp.contactPhone,
    url: opp.url,
    keywords_matched: opp.keywordsMatched.join(KEYWORD_DELIMITER),
    relevance: opp.relevance,
    service_type: opp.serviceType,
    source: opp.source,
    sector: opp.sector,
    opportunity_type: opp.opportunityType,
    status: opp.status,
    is_new: opp.isNew ? "true" : "false",
    notes: opp.notes,
  };
}

/**
 * Render the CSV document, prefixed with a UTF-8 byte-order mark so
 * spreadsheet tools pick the right encoding.
 */
export function renderCsv(opportunities: readonly Opportunity[]): string {
  const stringifier = createObjectCsvStringifier({
    header: CSV_COLUMNS.map((column) => ({ id: column, title: column })),
  });
  const header = stringifier.getHeaderString() ?? "";
  const records =
    opportunities.length > 0 ? stringifier.stringifyRecords(opportunities.map(toCsvRow)) : "";
  return `\uFEFF${header}${records}`;
}

/**
 * Write opportunities to CSV file, one row per opportunity.
 */
export function writeCsv(
  opportunities: readonly Opportunity[],
  outDir: string,
  logger: Logger
): Promise<string> {
  return writeOutputFile(outDir, CSV_FILE_NAME, renderCsv(opportunities), logger, opportunities.length);
}
