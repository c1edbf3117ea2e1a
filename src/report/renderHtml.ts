import {
  RELEVANCE_LEVELS,
  SOURCE_LABELS,
  type Opportunity,
  type Relevance,
  type ServiceType,
} from "../transform/schema.js";

export interface RenderOptions {
  generatedAt: Date;
  regionName: string;
  /** state procurement portal search endpoint, e.g. COMMBUYS public bids */
  portalSearchUrl?: string;
  csvFileName?: string;
}

const RELEVANCE_ORDER: Record<Relevance, number> = { high: 0, medium: 1, low: 2 };

const RELEVANCE_COLORS: Record<Relevance, string> = {
  high: "#c0392b",
  medium: "#e67e22",
  low: "#7f8c8d",
};

const SERVICE_TYPE_COLORS: Record<ServiceType, string> = {
  NEMT: "#16a085",
  Paratransit: "#2c3e50",
  Freight: "#34495e",
  "Rideshare/Gig": "#e84393",
  "Last-Mile Delivery": "#0984e3",
  "Courier/Delivery": "#d35400",
  "Shuttle/Charter": "#27ae60",
  Logistics: "#8e44ad",
  "Other Transport": "#7f8c8d",
};

const SOURCE_COLORS: Record<string, string> = {
  [SOURCE_LABELS.sam_gov]: "#2980b9",
  [SOURCE_LABELS.indeed]: "#2164f3",
  [SOURCE_LABELS.craigslist]: "#5a2d82",
  [SOURCE_LABELS.directory]: "#00897b",
  [SOURCE_LABELS.manual]: "#8e44ad",
};

const PORTAL_SEARCH_TERMS: ReadonlyArray<[label: string, query: string]> = [
  ["NEMT / Medical Transport", "non-emergency medical transportation"],
  ["Paratransit", "paratransit transportation"],
  ["Courier / Delivery", "courier delivery services"],
  ["Shuttle Services", "shuttle transportation"],
  ["Transportation Services", "transportation services"],
  ["Patient Transport", "patient transport"],
  ["Wheelchair Van", "wheelchair van service"],
  ["Fleet Services", "fleet management transportation"],
];

const MONTHS = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

export function escapeHtml(text: string | null | undefined): string {
  if (!text) return "";
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Short currency form: $1.5M, $750K, $500. Zero means unknown. */
export function formatCurrency(amount: number): string {
  if (!amount || !Number.isFinite(amount)) return "N/A";
  if (amount >= 1_000_000) return `$${(amount / 1_000_000).toFixed(1)}M`;
  if (amount >= 1_000) return `$${(amount / 1_000).toFixed(0)}K`;
  return `$${Math.round(amount).toLocaleString("en-US")}`;
}

/** e.g. "January 15, 2025 at 02:30 PM" (UTC) */
export function formatRunTime(date: Date): string {
  const hours = date.getUTCHours();
  const hour12 = String(hours % 12 || 12).padStart(2, "0");
  const minutes = String(date.getUTCMinutes()).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${MONTHS[date.getUTCMonth()]} ${day}, ${date.getUTCFullYear()} at ${hour12}:${minutes} ${hours < 12 ? "AM" : "PM"}`;
}

/**
 * Initial display order: relevance tier (high first), then award descending.
 */
export function sortForDisplay(opportunities: readonly Opportunity[]): Opportunity[] {
  return [...opportunities].sort(
    (a, b) =>
      RELEVANCE_ORDER[a.relevance] - RELEVANCE_ORDER[b.relevance] ||
      b.awardAmount - a.awardAmount
  );
}

export function portalSearchLink(baseUrl: string, keywords: string): string {
  const url = new URL(baseUrl);
  url.searchParams.set("keywords", keywords);
  return url.toString();
}

/** Cut to at most `max` code points so surrogate pairs stay whole. */
export function truncate(text: string, max: number): string {
  const chars = Array.from(text);
  return chars.length > max ? chars.slice(0, max).join("") : text;
}

function distinct(values: readonly string[]): string[] {
  return [...new Set(values)].sort();
}

function optionTags(values: readonly string[]): string {
  return values
    .map((v) => `<option value="${escapeHtml(v)}">${escapeHtml(v)}</option>`)
    .join("");
}

function badge(label: string, color: string): string {
  return `<span class="badge" style="background:${color};">${escapeHtml(label)}</span>`;
}

function renderCard(opp: Opportunity, options: RenderOptions): string {
  const titleSnippet = truncate(opp.title, 60);
  const links: string[] = [];
  if (opp.url) {
    const label = opp.source === SOURCE_LABELS.sam_gov ? "View on SAM.gov" : "View Source";
    links.push(`<a class="link-btn" href="${escapeHtml(opp.url)}" target="_blank" rel="noopener">${label}</a>`);
  }
  if (options.portalSearchUrl && opp.sector === "public") {
    links.push(
      `<a class="link-btn" href="${escapeHtml(portalSearchLink(options.portalSearchUrl, titleSnippet))}" target="_blank" rel="noopener">Search Portal</a>`
    );
  }
  const newsQuery = encodeURIComponent(`"${titleSnippet}" ${options.regionName} transportation`);
  links.push(
    `<a class="link-btn" href="https://www.google.com/search?q=${newsQuery}" target="_blank" rel="noopener">Search News</a>`
  );
  if (opp.contactEmail) {
    const subject = encodeURIComponent(`Inquiry: ${truncate(opp.title, 80)}`);
    links.push(`<a class="link-btn" href="mailto:${escapeHtml(opp.contactEmail)}?subject=${subject}">Contact</a>`);
  }

  const contactParts: string[] = [];
  if (opp.contactName) contactParts.push(escapeHtml(opp.contactName));
  if (opp.contactEmail) {
    const email = escapeHtml(opp.contactEmail);
    contactParts.push(`<a href="mailto:${email}">${email}</a>`);
  }
  if (opp.contactPhone) contactParts.push(escapeHtml(opp.contactPhone));

  const keywords = distinct(opp.keywordsMatched);
  const description = opp.description || "N/A";
  const descShort =
    Array.from(description).length > 300 ? `${truncate(description, 300)}...` : description;

  const searchFields = [
    opp.title,
    opp.agency,
    opp.description,
    opp.keywordsMatched.join(" "),
    opp.contactName,
    opp.serviceType,
    opp.placeOfPerformance,
    opp.naicsCode,
    opp.notes,
  ];
  const searchText = truncate(searchFields.join(" ").toLowerCase(), 500);

  return `<div class="opp-card" data-source="${escapeHtml(opp.source)}" data-sector="${opp.sector}" data-relevance="${opp.relevance}" data-service-type="${escapeHtml(opp.serviceType)}" data-status="${escapeHtml(opp.status)}" data-is-new="${opp.isNew}" data-date="${escapeHtml(opp.postedDate)}" data-deadline="${escapeHtml(opp.responseDeadline)}" data-search="${escapeHtml(searchText)}">
<div class="card-header"><div class="card-title-row"><strong class="card-name">${escapeHtml(truncate(opp.title, 120))}</strong>
<div class="card-badges">${badge(opp.source, SOURCE_COLORS[opp.source] ?? "#7f8c8d")}${badge(opp.relevance.toUpperCase(), RELEVANCE_COLORS[opp.relevance])}${badge(opp.serviceType, SERVICE_TYPE_COLORS[opp.serviceType])}${opp.isNew ? '<span class="badge badge-new">NEW</span>' : ""}</div></div>
<div class="card-sub">${escapeHtml(opp.agency)}${opp.naicsCode ? ` &bull; NAICS: ${escapeHtml(opp.naicsCode)}` : ""}</div></div>
<div class="card-detail"><strong>Posted:</strong> ${escapeHtml(opp.postedDate) || "N/A"} &bull; <strong>Deadline:</strong> ${escapeHtml(opp.responseDeadline) || "N/A"} &bull; <strong>Award:</strong> ${formatCurrency(opp.awardAmount)}</div>
<div class="card-detail"><strong>Location:</strong> ${escapeHtml(opp.placeOfPerformance) || "N/A"}</div>
<div class="card-desc">${escapeHtml(descShort)}</div>
${contactParts.length > 0 ? `<div class="card-contact">${contactParts.join(" &bull; ")}</div>` : ""}
${keywords.length > 0 ? `<div class="card-keywords">Keywords: ${keywords.map((k) => `<span class="kw-tag">${escapeHtml(k)}</span>`).join("")}</div>` : ""}
${opp.notes ? `<div class="card-notes"><strong>Notes:</strong> ${escapeHtml(opp.notes)}</div>` : ""}
<div class="card-links">${links.join("")}</div>
</div>`;
}

const STYLE = `
* { box-sizing: border-box; margin: 0; padding: 0; }
body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, sans-serif; background: #f5f5f5; color: #222; padding: 16px; max-width: 960px; margin: 0 auto; }
h1 { font-size: 1.3em; margin-bottom: 4px; }
.summary { background: #fff; border-radius: 8px; padding: 12px; margin-bottom: 12px; }
.summary-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(110px, 1fr)); gap: 8px; }
.stat { text-align: center; }
.stat-num { font-size: 1.5em; font-weight: 700; }
.stat-label { font-size: 0.75em; color: #777; }
.portal-section { background: #fff; border-radius: 8px; padding: 10px 12px; margin-bottom: 12px; }
.toolbar { background: #fff; border-radius: 8px; padding: 12px; margin-bottom: 12px; }
.search-input { width: 100%; padding: 8px; border: 1px solid #ccc; border-radius: 6px; margin-bottom: 8px; }
.filter-row { display: flex; flex-wrap: wrap; gap: 6px; }
.filter-select, .csv-btn { padding: 6px 8px; border: 1px solid #ccc; border-radius: 6px; background: #fff; font-size: 0.85em; }
.csv-btn { text-decoration: none; color: #2980b9; }
.filter-count { font-size: 0.8em; color: #777; margin-top: 6px; }
.opp-card { background: #fff; border-radius: 8px; padding: 12px; margin-bottom: 10px; border-left: 4px solid #ddd; }
.opp-card[data-is-new="true"] { border-left-color: #27ae60; }
.card-title-row { display: flex; justify-content: space-between; gap: 8px; flex-wrap: wrap; }
.badge { display: inline-block; color: #fff; font-size: 0.7em; padding: 2px 6px; border-radius: 4px; margin-left: 4px; }
.badge-new { background: #27ae60; }
.card-sub, .card-detail, .card-contact, .card-notes { font-size: 0.85em; color: #555; margin-top: 4px; }
.card-desc { font-size: 0.85em; margin-top: 6px; }
.kw-tag { display: inline-block; background: #eef; border-radius: 3px; padding: 1px 5px; margin: 2px; font-size: 0.8em; }
.link-btn { display: inline-block; font-size: 0.8em; margin: 6px 6px 0 0; padding: 4px 8px; border: 1px solid #2980b9; border-radius: 4px; color: #2980b9; text-decoration: none; }
.no-results { display: none; text-align: center; color: #999; padding: 24px; }
@media (max-width: 600px) { .filter-select, .csv-btn { flex: 1 1 45%; } }
`;

const SCRIPT = `
(function() {
  var container = document.getElementById('cardContainer');
  var cards = Array.prototype.slice.call(container.getElementsByClassName('opp-card'));
  var initial = cards.slice();
  var noResults = document.getElementById('noResults');
  var countEl = document.getElementById('filterCount');
  var searchInput = document.getElementById('searchInput');
  var filters = {
    'data-sector': document.getElementById('filterSector'),
    'data-source': document.getElementById('filterSource'),
    'data-relevance': document.getElementById('filterRelevance'),
    'data-service-type': document.getElementById('filterServiceType'),
    'data-status': document.getElementById('filterStatus')
  };
  var sortOrder = document.getElementById('sortOrder');
  var debounceTimer = null;

  function applyFilters() {
    var q = searchInput.value.toLowerCase().trim();
    var shown = 0;
    cards.forEach(function(c) {
      var visible = true;
      Object.keys(filters).forEach(function(attr) {
        var v = filters[attr].value;
        if (v && c.getAttribute(attr) !== v) visible = false;
      });
      if (q && c.getAttribute('data-search').indexOf(q) === -1) visible = false;
      c.style.display = visible ? '' : 'none';
      if (visible) shown++;
    });
    countEl.textContent = 'Showing ' + shown + ' of ' + cards.length + ' opportunities';
    noResults.style.display = shown === 0 ? 'block' : 'none';
  }

  function applySort() {
    var order = sortOrder.value;
    var sorted = initial.slice();
    if (order === 'newest' || order === 'oldest') {
      sorted.sort(function(a, b) {
        var da = a.getAttribute('data-date') || '';
        var db = b.getAttribute('data-date') || '';
        var cmp = da < db ? -1 : (da > db ? 1 : 0);
        return order === 'newest' ? -cmp : cmp;
      });
    } else if (order === 'deadline') {
      sorted.sort(function(a, b) {
        var da = a.getAttribute('data-deadline') || 'zzzz';
        var db = b.getAttribute('data-deadline') || 'zzzz';
        return da < db ? -1 : (da > db ? 1 : 0);
      });
    }
    sorted.forEach(function(c) { container.appendChild(c); });
  }

  function update() { applySort(); applyFilters(); }

  searchInput.addEventListener('input', function() {
    if (debounceTimer) clearTimeout(debounceTimer);
    debounceTimer = setTimeout(update, 200);
  });
  Object.keys(filters).forEach(function(attr) { filters[attr].addEventListener('change', update); });
  sortOrder.addEventListener('change', update);
  applyFilters();
})();
`;

/**
 * Render the self-contained report. Opportunities are shown in display order
 * (see `sortForDisplay`); filtering and re-sorting happen client-side.
 */
export function renderReport(
  opportunities: readonly Opportunity[],
  options: RenderOptions
): string {
  const sorted = sortForDisplay(opportunities);
  const region = escapeHtml(options.regionName);
  const csvFileName = options.csvFileName ?? "opportunities.csv";

  const sources = distinct(sorted.map((o) => o.source));
  const stats: Array<[string, number]> = [
    ["New This Run", sorted.filter((o) => o.isNew).length],
    ["Total Tracked", sorted.length],
    ...sources.map((s): [string, number] => [s, sorted.filter((o) => o.source === s).length]),
    ["High Relevance", sorted.filter((o) => o.relevance === "high").length],
    ["Active", sorted.filter((o) => o.status.toLowerCase() === "active").length],
  ];

  const statsHtml = stats
    .map(
      ([label, n]) =>
        `<div class="stat"><div class="stat-num">${n}</div><div class="stat-label">${escapeHtml(label)}</div></div>`
    )
    .join("\n");

  const portalUrl = options.portalSearchUrl;
  const portalHtml = portalUrl
    ? `<details class="portal-section"><summary>Procurement Portal Quick Links</summary><div>${PORTAL_SEARCH_TERMS.map(
        ([label, query]) =>
          `<a class="link-btn" href="${escapeHtml(portalSearchLink(portalUrl, query))}" target="_blank" rel="noopener">${escapeHtml(label)}</a>`
      ).join("\n")}</div></details>`
    : "";

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${region} Transportation Opportunity Tracker</title>
<style>${STYLE}</style>
</head>
<body>
<h1>${region} Transportation Opportunity Tracker</h1>
<p style="color:#888;font-size:0.85em;margin-bottom:12px;">Contracts, jobs &amp; partnerships in ${region} &bull; Updated ${formatRunTime(options.generatedAt)} UTC</p>
<div class="summary"><div class="summary-grid">
${statsHtml}
</div></div>
${portalHtml}
<div class="toolbar">
<input type="text" id="searchInput" class="search-input" placeholder="Search title, agency, description, keywords, contact, service type...">
<div class="filter-row">
<select id="filterSector" class="filter-select"><option value="">All Sectors</option><option value="public">Public</option><option value="private">Private</option></select>
<select id="filterSource" class="filter-select"><option value="">All Sources</option>${optionTags(sources)}</select>
<select id="filterRelevance" class="filter-select"><option value="">All Relevance</option>${RELEVANCE_LEVELS.map((r) => `<option value="${r}">${r[0].toUpperCase()}${r.slice(1)}</option>`).join("")}</select>
<select id="filterServiceType" class="filter-select"><option value="">All Service Types</option>${optionTags(distinct(sorted.map((o) => o.serviceType)))}</select>
<select id="filterStatus" class="filter-select"><option value="">All Statuses</option>${optionTags(distinct(sorted.map((o) => o.status)))}</select>
<select id="sortOrder" class="filter-select"><option value="default">Sort: Default</option><option value="newest">Sort: Newest First</option><option value="oldest">Sort: Oldest First</option><option value="deadline">Sort: Deadline Soonest</option></select>
<a href="${escapeHtml(csvFileName)}" class="csv-btn" download>Download CSV</a>
</div>
<div class="filter-count" id="filterCount"></div>
</div>
<div id="cardContainer">
${sorted.map((o) => renderCard(o, options)).join("\n")}
</div>
<div class="no-results" id="noResults">No opportunities match your filters.</div>
<script>${SCRIPT}</script>
</body>
</html>
`;
}
