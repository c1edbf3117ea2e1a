import {
  Opportunity,
  SOURCE_LABELS,
  type DirectoryEntry,
  type ManualEntry,
  type Sector,
  type ServiceType,
} from "./schema.js";
import {
  samAgency,
  samPlace,
  samPrimaryContact,
  samUrl,
  type SamOpportunity,
} from "./samRecord.js";
import { containsExcluded, matchKeywords, mergeKeywords } from "./match.js";
import { classifyServiceType } from "./classify.js";
import { scoreRelevance } from "./score.js";
import { normalizeDate } from "../util/time.js";
import { stableId } from "../util/hash.js";
import type { FeedCategory, FeedItem } from "../client/feeds.js";
import type { DirectoryStatus } from "../client/directory.js";
import type { Logger } from "../util/logger.js";

/** Source-shaped records, as handed over by the adapters. */
export type RawRecord =
  | { kind: "sam_gov"; record: SamOpportunity }
  | { kind: "feed"; category: FeedCategory; item: FeedItem }
  | { kind: "directory"; entry: DirectoryEntry; status: DirectoryStatus }
  | { kind: "manual"; entry: ManualEntry };

export interface MatchSettings {
  directKeywords: string[];
  serviceKeywords: string[];
  privateSectorKeywords: string[];
  excludeKeywords: string[];
  highValueThreshold: number;
  regionName: string;
}

const GIG_SERVICE_TYPES: ReadonlySet<ServiceType> = new Set<ServiceType>([
  "Rideshare/Gig",
  "Last-Mile Delivery",
]);

type Draft = Omit<
  Opportunity,
  "keywordsMatched" | "relevance" | "serviceType" | "isNew"
> & {
  searchText: string;
  /** job postings that classify as gig work become `gig` */
  gigEligible: boolean;
};

function joinText(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join(" ");
}

function fromSam(opp: SamOpportunity, settings: MatchSettings): Draft {
  const contact = samPrimaryContact(opp);
  return {
    id: opp.noticeId,
    title: opp.title,
    solicitationNumber: opp.solicitationNumber,
    agency: samAgency(opp),
    description: opp.description,
    placeOfPerformance: samPlace(opp, settings.regionName),
    url: samUrl(opp),
    notes: "",
    postedDate: normalizeDate(opp.postedDate),
    responseDeadline: normalizeDate(opp.responseDeadLine),
    naicsCode: opp.naicsCode,
    awardAmount: opp.award,
    contactName: contact.fullName,
    contactEmail: contact.email,
    contactPhone: contact.phone,
    source: SOURCE_LABELS.sam_gov,
    sector: "public",
    opportunityType: "contract",
    status: "active",
    searchText: joinText(
      opp.title,
      opp.description,
      opp.organizationName,
      opp.placeOfPerformance.state
    ),
    gigEligible: false,
  };
}

function fromFeed(category: FeedCategory, item: FeedItem, settings: MatchSettings): Draft {
  return {
    id: stableId(category, item.link),
    title: item.title,
    solicitationNumber: "",
    agency: item.author || "N/A",
    description: item.description,
    placeOfPerformance: settings.regionName,
    url: item.link,
    notes: "",
    postedDate: normalizeDate(item.pubDate),
    responseDeadline: "",
    naicsCode: "",
    awardAmount: 0,
    contactName: "",
    contactEmail: "",
    contactPhone: "",
    source: SOURCE_LABELS[category],
    sector: "private",
    opportunityType: "job_posting",
    status: "active",
    searchText: joinText(item.title, item.description),
    gigEligible: true,
  };
}

function fromDirectory(
  entry: DirectoryEntry,
  status: DirectoryStatus,
  settings: MatchSettings
): Draft {
  const notes = [
    entry.category && `Category: ${entry.category}`,
    entry.requirements && `Requirements: ${entry.requirements}`,
    entry.earning_potential && `Earning potential: ${entry.earning_potential}`,
  ].filter((n): n is string => Boolean(n));

  return {
    id: stableId("directory", entry.url),
    title: entry.name,
    solicitationNumber: "",
    agency: entry.name,
    description: entry.description,
    placeOfPerformance: settings.regionName,
    url: entry.url,
    notes: notes.join(" | "),
    postedDate: "",
    responseDeadline: "",
    naicsCode: "",
    awardAmount: 0,
    contactName: "",
    contactEmail: "",
    contactPhone: "",
    source: SOURCE_LABELS.directory,
    sector: "private",
    opportunityType: "partnership",
    status,
    searchText: joinText(
      entry.name,
      entry.category,
      entry.description,
      entry.requirements,
      entry.earning_potential
    ),
    gigEligible: false,
  };
}

function fromManual(entry: ManualEntry, settings: MatchSettings): Draft {
  return {
    id: entry.id || stableId("manual", `${entry.title}|${entry.url}`),
    title: entry.title,
    solicitationNumber: entry.solicitation_number,
    agency: entry.agency || "N/A",
    description: entry.description,
    placeOfPerformance: entry.place_of_performance || settings.regionName,
    url: entry.url,
    notes: entry.notes,
    postedDate: normalizeDate(entry.posted_date),
    responseDeadline: normalizeDate(entry.response_deadline),
    naicsCode: entry.naics_code,
    awardAmount: entry.award_amount,
    contactName: entry.contact_name,
    contactEmail: entry.contact_email,
    contactPhone: entry.contact_phone,
    source: SOURCE_LABELS.manual,
    sector: entry.sector,
    opportunityType: entry.opportunity_type,
    status: entry.status || "active",
    searchText: joinText(entry.title, entry.description, entry.agency, entry.notes),
    gigEligible: false,
  };
}

function toDraft(raw: RawRecord, settings: MatchSettings): Draft {
  switch (raw.kind) {
    case "sam_gov":
      return fromSam(raw.record, settings);
    case "feed":
      return fromFeed(raw.category, raw.item, settings);
    case "directory":
      return fromDirectory(raw.entry, raw.status, settings);
    case "manual":
      return fromManual(raw.entry, settings);
  }
}

function serviceKeywordsFor(sector: Sector, settings: MatchSettings): string[] {
  return sector === "private"
    ? mergeKeywords(settings.serviceKeywords, settings.privateSectorKeywords)
    : settings.serviceKeywords;
}

/**
 * Map one raw record into an Opportunity, or `null` when an exclude keyword hits.
 * The result is not yet validated and has `isNew: false`.
 */
export function mapOpportunity(raw: RawRecord, settings: MatchSettings): Opportunity | null {
  const { searchText, gigEligible, ...draft } = toDraft(raw, settings);

  if (containsExcluded(searchText, settings.excludeKeywords)) {
    return null;
  }

  const matchedDirect = matchKeywords(searchText, settings.directKeywords);
  const matchedService = matchKeywords(searchText, serviceKeywordsFor(draft.sector, settings));
  const keywordsMatched = mergeKeywords(matchedDirect, matchedService);
  const serviceType = classifyServiceType(searchText, keywordsMatched);

  return {
    ...draft,
    opportunityType:
      gigEligible && GIG_SERVICE_TYPES.has(serviceType) ? "gig" : draft.opportunityType,
    keywordsMatched,
    relevance: scoreRelevance(
      matchedDirect,
      matchedService,
      draft.awardAmount,
      settings.highValueThreshold
    ),
    serviceType,
    isNew: false,
  };
}

/**
 * Filter, classify, score and validate raw records from any source.
 * Excluded records are dropped silently; records failing the schema are
 * dropped with a warning.
 */
export function normalize(
  records: readonly RawRecord[],
  settings: MatchSettings,
  logger?: Logger
): Opportunity[] {
  const opportunities: Opportunity[] = [];
  let excluded = 0;

  for (const raw of records) {
    const mapped = mapOpportunity(raw, settings);
    if (!mapped) {
      excluded++;
      continue;
    }

    const result = Opportunity.safeParse(mapped);
    if (result.success) {
      opportunities.push(result.data);
    } else {
      logger?.warn(
        { id: mapped.id, source: mapped.source, error: result.error.message },
        "Rejected opportunity"
      );
    }
  }

  if (excluded > 0) {
    logger?.debug({ excluded }, "Dropped excluded records");
  }
  return opportunities;
}
