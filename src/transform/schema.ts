import { z } from "zod";

export const RELEVANCE_LEVELS = ["high", "medium", "low"] as const;
export const Relevance = z.enum(RELEVANCE_LEVELS);
export type Relevance = z.infer<typeof Relevance>;

export const SERVICE_TYPES = [
  "NEMT",
  "Paratransit",
  "Freight",
  "Rideshare/Gig",
  "Last-Mile Delivery",
  "Courier/Delivery",
  "Shuttle/Charter",
  "Logistics",
  "Other Transport",
] as const;
export const ServiceType = z.enum(SERVICE_TYPES);
export type ServiceType = z.infer<typeof ServiceType>;

export const Sector = z.enum(["public", "private"]);
export type Sector = z.infer<typeof Sector>;

export const OpportunityType = z.enum([
  "contract",
  "job_posting",
  "partnership",
  "gig",
]);
export type OpportunityType = z.infer<typeof OpportunityType>;

/** Novelty categories; each owns its own set of seen ids. */
export const SOURCE_CATEGORIES = [
  "sam_gov",
  "indeed",
  "craigslist",
  "directory",
  "manual",
] as const;
export type SourceCategory = (typeof SOURCE_CATEGORIES)[number];

export const SOURCE_LABELS: Record<SourceCategory, string> = {
  sam_gov: "SAM.gov",
  indeed: "Indeed",
  craigslist: "Craigslist",
  directory: "Directory",
  manual: "Manual",
};

/**
 * Normalized opportunity schema.
 * This is the canonical record every source is mapped into.
 */
export const Opportunity = z.object({
  id: z.string().min(1),
  title: z.string(),
  solicitationNumber: z.string().default(""),
  agency: z.string(),
  description: z.string(),
  placeOfPerformance: z.string(),
  url: z.string(),
  notes: z.string().default(""),
  postedDate: z.string(), // YYYY-MM-DD when derivable
  responseDeadline: z.string(),
  naicsCode: z.string().default(""),
  awardAmount: z.number().nonnegative(), // 0 means unknown
  contactName: z.string().default(""),
  contactEmail: z.string().default(""),
  contactPhone: z.string().default(""),
  keywordsMatched: z.array(z.string()),
  relevance: Relevance,
  serviceType: ServiceType,
  source: z.string(),
  sector: Sector,
  opportunityType: OpportunityType,
  status: z.string().min(1),
  isNew: z.boolean(),
});

export type Opportunity = z.infer<typeof Opportunity>;

/** Amounts arrive as numbers, numeric strings, null or junk; junk becomes 0. */
export const AmountField = z.coerce.number().finite().nonnegative().catch(0);

const text = z.string().catch("");

/**
 * Curated manual entry, same semantic fields as an Opportunity minus computed ones.
 */
export const ManualEntry = z.object({
  id: text,
  title: text,
  solicitation_number: text,
  agency: text,
  posted_date: text,
  response_deadline: text,
  naics_code: text,
  award_amount: AmountField,
  place_of_performance: text,
  description: text,
  contact_name: text,
  contact_email: text,
  contact_phone: text,
  url: text,
  status: text,
  notes: text,
  sector: Sector.catch("public"),
  opportunity_type: OpportunityType.catch("contract"),
});

export type ManualEntry = z.infer<typeof ManualEntry>;

export const DirectoryEntry = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  category: z.string().default(""),
  description: z.string().default(""),
  requirements: z.string().default(""),
  earning_potential: z.string().default(""),
});

export type DirectoryEntry = z.infer<typeof DirectoryEntry>;
