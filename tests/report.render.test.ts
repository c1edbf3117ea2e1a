import {
  escapeHtml,
  formatCurrency,
  formatRunTime,
  portalSearchLink,
  renderReport,
  sortForDisplay,
  truncate,
} from "../src/report/renderHtml.js";
import { makeOpportunity } from "./fixtures/opportunities.js";

const PORTAL = "https://www.commbuys.com/bso/external/publicBids.sdo";

describe("formatting helpers", () => {
  it("escapes markup characters", () => {
    expect(escapeHtml('<a href="x">&</a>')).toBe("&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;");
    expect(escapeHtml(undefined)).toBe("");
  });

  it.each([
    [0, "N/A"],
    [500, "$500"],
    [1000, "$1K"],
    [750000, "$750K"],
    [1500000, "$1.5M"],
  ])("formats %d as %s", (amount, expected) => {
    expect(formatCurrency(amount)).toBe(expected);
  });

  it("formats the run time in UTC on a 12-hour clock", () => {
    expect(formatRunTime(new Date("2025-01-15T14:30:00Z"))).toBe("January 15, 2025 at 02:30 PM");
    expect(formatRunTime(new Date("2025-03-01T00:05:00Z"))).toBe("March 01, 2025 at 12:05 AM");
  });

  it("truncates without splitting surrogate pairs", () => {
    expect(truncate("ab🚐cd", 3)).toBe("ab🚐");
    expect(truncate("short", 60)).toBe("short");
  });

  it("builds portal search links", () => {
    expect(portalSearchLink(PORTAL, "patient transport")).toBe(`${PORTAL}?keywords=patient+transport`);
  });
});

describe("sortForDisplay", () => {
  it("orders by relevance tier, then award descending", () => {
    const sorted = sortForDisplay([
      makeOpportunity({ id: "low", relevance: "low" }),
      makeOpportunity({ id: "high-small", relevance: "high", awardAmount: 100 }),
      makeOpportunity({ id: "medium", relevance: "medium" }),
      makeOpportunity({ id: "high-large", relevance: "high", awardAmount: 900000 }),
    ]);
    expect(sorted.map((o) => o.id)).toEqual(["high-large", "high-small", "medium", "low"]);
  });
});

describe("renderReport", () => {
  const generatedAt = new Date("2025-01-15T14:30:00Z");
  const publicOpp = makeOpportunity({
    id: "pub",
    title: "Paratransit <Services>",
    source: "SAM.gov",
    relevance: "high",
    serviceType: "Paratransit",
    isNew: true,
    contactEmail: "buyer@example.gov",
  });
  const privateOpp = makeOpportunity({
    id: "priv",
    title: "Courier Driver",
    source: "Indeed",
    sector: "private",
    opportunityType: "job_posting",
    serviceType: "Courier/Delivery",
    status: "unverified",
  });

  it("renders one card per opportunity with its filter attributes", () => {
    const html = renderReport([privateOpp, publicOpp], { generatedAt, regionName: "Massachusetts" });
    expect(html.match(/<div class="opp-card"/g)).toHaveLength(2);
    expect(html).toContain(
      '<div class="opp-card" data-source="SAM.gov" data-sector="public" data-relevance="high" data-service-type="Paratransit" data-status="active" data-is-new="true" data-date="2025-01-10" data-deadline="2025-02-01"'
    );
    expect(html).toContain('data-source="Indeed" data-sector="private" data-relevance="medium"');
    expect(html.indexOf('data-source="SAM.gov"')).toBeLessThan(html.indexOf('data-source="Indeed"'));
  });

  it("escapes record text", () => {
    const html = renderReport([publicOpp], { generatedAt, regionName: "Massachusetts" });
    expect(html).toContain('<strong class="card-name">Paratransit &lt;Services&gt;</strong>');
    expect(html).not.toContain("<Services>");
  });

  it("summarizes counts and the run time", () => {
    const html = renderReport([privateOpp, publicOpp], { generatedAt, regionName: "Massachusetts" });
    const stat = (n: number, label: string) =>
      `<div class="stat"><div class="stat-num">${n}</div><div class="stat-label">${label}</div></div>`;
    expect(html).toContain(stat(1, "New This Run"));
    expect(html).toContain(stat(2, "Total Tracked"));
    expect(html).toContain(stat(1, "SAM.gov"));
    expect(html).toContain(stat(1, "Indeed"));
    expect(html).toContain(stat(1, "High Relevance"));
    expect(html).toContain(stat(1, "Active"));
    expect(html).toContain("Updated January 15, 2025 at 02:30 PM UTC");
  });

  it("offers filter options from the data", () => {
    const html = renderReport([privateOpp, publicOpp], { generatedAt, regionName: "Massachusetts" });
    expect(html).toContain(
      '<select id="filterSource" class="filter-select"><option value="">All Sources</option><option value="Indeed">Indeed</option><option value="SAM.gov">SAM.gov</option></select>'
    );
    expect(html).toContain(
      '<option value="">All Statuses</option><option value="active">active</option><option value="unverified">unverified</option>'
    );
    expect(html).toContain('<a href="opportunities.csv" class="csv-btn" download>Download CSV</a>');
  });

  it("links public records to the procurement portal when one is configured", () => {
    const html = renderReport([privateOpp, publicOpp], {
      generatedAt,
      regionName: "Massachusetts",
      portalSearchUrl: PORTAL,
    });
    expect(html.match(/>Search Portal<\/a>/g)).toHaveLength(1);
    expect(html).toContain(`href="${PORTAL}?keywords=Paratransit+%3CServices%3E"`);
    expect(html).toContain("<summary>Procurement Portal Quick Links</summary>");
    expect(html).toContain(`href="${PORTAL}?keywords=non-emergency+medical+transportation"`);
  });

  it("omits portal links without a portal URL", () => {
    const html = renderReport([publicOpp], { generatedAt, regionName: "Massachusetts" });
    expect(html).not.toContain("Search Portal");
    expect(html).not.toContain("Procurement Portal Quick Links");
  });

  it("adds source, news and contact links", () => {
    const html = renderReport([publicOpp], { generatedAt, regionName: "Massachusetts" });
    expect(html).toContain(
      '<a class="link-btn" href="https://example.gov/bids/1" target="_blank" rel="noopener">View on SAM.gov</a>'
    );
    expect(html).toContain(">Search News</a>");
    expect(html).toContain(
      `<a class="link-btn" href="mailto:buyer@example.gov?subject=${encodeURIComponent("Inquiry: Paratransit <Services>")}">Contact</a>`
    );
  });

  it("renders titles with an emoji at the link cut-off", () => {
    const title = `${"A".repeat(59)}🚐 van driver`;
    const opp = makeOpportunity({ title, contactEmail: "buyer@example.gov" });
    const html = renderReport([opp], { generatedAt, regionName: "Massachusetts", portalSearchUrl: PORTAL });

    const newsQuery = encodeURIComponent(`"${"A".repeat(59)}🚐" Massachusetts transportation`);
    expect(html).toContain(`href="https://www.google.com/search?q=${newsQuery}"`);
    expect(html).toContain(`?subject=${encodeURIComponent(`Inquiry: ${title}`)}">Contact</a>`);
  });
});
