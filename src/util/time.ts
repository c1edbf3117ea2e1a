const ISO_DATE_PREFIX = /^(\d{4}-\d{2}-\d{2})/;
const US_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/**
 * Normalize a date string to YYYY-MM-DD when the format is recognizable.
 * Accepts ISO timestamps, MM/DD/YYYY (SAM.gov) and anything `Date` parses
 * (RSS pubDate). Unrecognized input is returned trimmed; empty stays empty.
 */
export function normalizeDate(dateStr: string | null | undefined): string {
  if (!dateStr) return "";
  const s = dateStr.trim();
  if (!s) return "";

  const iso = ISO_DATE_PREFIX.exec(s);
  if (iso) return iso[1];

  const us = US_DATE.exec(s);
  if (us) {
    const [, month, day, year] = us;
    const d = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
    // Date.UTC rolls 13/45 over into a later month; keep such input as written
    if (d.getUTCMonth() !== Number(month) - 1 || d.getUTCDate() !== Number(day)) return s;
    return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
  }

  const d = new Date(s);
  if (!isNaN(d.getTime())) {
    return d.toISOString().slice(0, 10);
  }
  return s;
}

/**
 * Format a date as MM/DD/YYYY (UTC), the form the SAM.gov search API takes.
 */
export function toUsDate(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${month}/${day}/${date.getUTCFullYear()}`;
}

export function daysBefore(date: Date, days: number): Date {
  return new Date(date.getTime() - days * 24 * 60 * 60 * 1000);
}
