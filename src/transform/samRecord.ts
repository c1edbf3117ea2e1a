import { z } from "zod";
import { AmountField } from "./schema.js";

/*
 * Decoders for loosely typed SAM.gov search records. Each field falls back
 * to a documented default instead of failing the whole record:
 *   strings          -> ""
 *   award            -> { amount } | number | numeric string, else 0
 *   place names      -> { name } | string, else ""
 *   pointOfContact   -> list (first entry used) | single object, else none
 */

const text = z.string().catch("");

const placeName = z
  .union([z.object({ name: text }).transform((v) => v.name), z.string()])
  .catch("");

const contact = z.object({
  fullName: text,
  email: text,
  phone: text,
});

export type SamContact = z.infer<typeof contact>;

const SamOpportunitySchema = z.object({
  noticeId: text,
  title: text,
  solicitationNumber: text,
  description: text,
  organizationName: text,
  fullParentPathName: text,
  departmentName: text,
  postedDate: text,
  responseDeadLine: text,
  naicsCode: text,
  uiLink: text,
  award: z
    .union([z.object({ amount: AmountField }).transform((a) => a.amount), AmountField])
    .catch(0),
  placeOfPerformance: z
    .object({ city: placeName, state: placeName })
    .catch({ city: "", state: "" }),
  pointOfContact: z
    .union([z.array(contact), contact.transform((c) => [c])])
    .catch([]),
});

export type SamOpportunity = z.infer<typeof SamOpportunitySchema>;

export function decodeSamOpportunity(raw: unknown): SamOpportunity {
  const isRecord = typeof raw === "object" && raw !== null && !Array.isArray(raw);
  return SamOpportunitySchema.parse(isRecord ? raw : {});
}

export const SamSearchResponse = z.object({
  totalRecords: z.coerce.number().int().nonnegative().catch(0),
  opportunitiesData: z.array(z.unknown()).catch([]),
});

export type SamSearchResponse = z.infer<typeof SamSearchResponse>;

export function samAgency(opp: SamOpportunity): string {
  return opp.organizationName || opp.fullParentPathName || opp.departmentName || "N/A";
}

export function samPlace(opp: SamOpportunity, fallback: string): string {
  const { city, state } = opp.placeOfPerformance;
  return [city, state].filter((part) => part.length > 0).join(", ") || fallback;
}

export function samPrimaryContact(opp: SamOpportunity): SamContact {
  return opp.pointOfContact[0] ?? { fullName: "", email: "", phone: "" };
}

export function samUrl(opp: SamOpportunity): string {
  if (opp.uiLink) return opp.uiLink;
  return opp.noticeId ? `https://sam.gov/opp/${opp.noticeId}/view` : "";
}
