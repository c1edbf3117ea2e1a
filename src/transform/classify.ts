import type { ServiceType } from "./schema.js";

interface ServiceTypeRule {
  serviceType: ServiceType;
  terms: readonly string[];
}

/**
 * Ordered most specific to most generic; the first rule with a hit wins.
 * A posting that mentions both "nemt" and "fleet" is NEMT.
 */
export const SERVICE_TYPE_RULES: readonly ServiceTypeRule[] = [
  {
    serviceType: "NEMT",
    terms: [
      "nemt",
      "non-emergency medical",
      "medical transport",
      "patient transport",
      "medicaid transport",
      "modivcare",
      "logisticare",
      "medical transportation management",
      "veyo",
    ],
  },
  {
    serviceType: "Paratransit",
    terms: ["paratransit", "dial-a-ride", "wheelchair", "stretcher", "ambulatory", "ada transport"],
  },
  {
    serviceType: "Freight",
    terms: [
      "freight",
      "trucking",
      "cdl",
      "owner operator",
      "owner-operator",
      "box truck",
      "j.b. hunt",
      "schneider",
      "landstar",
    ],
  },
  {
    serviceType: "Rideshare/Gig",
    terms: ["rideshare", "ride share", "uber", "lyft", "doordash", "instacart", "grubhub", "food delivery", "gig"],
  },
  {
    serviceType: "Last-Mile Delivery",
    terms: [
      "last-mile",
      "last mile",
      "amazon flex",
      "delivery service partner",
      "fedex ground",
      "cargo van",
      "delivery route",
    ],
  },
  {
    serviceType: "Courier/Delivery",
    terms: ["courier", "delivery", "specimen", "laboratory", "pharmacy"],
  },
  {
    serviceType: "Shuttle/Charter",
    terms: ["shuttle", "airport", "charter", "passenger", "van service"],
  },
  {
    serviceType: "Logistics",
    terms: ["logistics", "fleet", "ground transportation"],
  },
];

export function classifyServiceType(
  text: string | null | undefined,
  matchedKeywords: readonly string[] = []
): ServiceType {
  const haystack = `${text ?? ""} ${matchedKeywords.join(" ")}`.toLowerCase();
  const rule = SERVICE_TYPE_RULES.find((r) =>
    r.terms.some((term) => haystack.includes(term))
  );
  return rule ? rule.serviceType : "Other Transport";
}
