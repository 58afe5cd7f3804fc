// Calendar-date helpers. Dates travel as "YYYY-MM-DD" strings; arithmetic happens in UTC.

const DAY_MS = 86400000;

export function parseGmtOffsetToMinutes(input: string): number | null {
  // Accept: "GMT+3", "GMT+03:00", "UTC-7", "GMT-03:30"
  const m = input.trim().match(/^(?:GMT|UTC)\s*([+-])\s*(\d{1,2})(?::?(\d{2}))?$/i);
  if (!m) return null;
  const sign = m[1] === "-" ? -1 : 1;
  const hh = Number(m[2]);
  const mm = m[3] ? Number(m[3]) : 0;
  if (hh < 0 || hh > 14) return null;
  if (mm < 0 || mm > 59) return null;
  return sign * (hh * 60 + mm);
}

export function getLocalParts(date: Date, timeZone: string): { year: number; month: number; day: number; hour: number } {
  const off = parseGmtOffsetToMinutes(timeZone);
  if (off !== null) {
    const d = new Date(date.getTime() + off * 60000);
    return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1, day: d.getUTCDate(), hour: d.getUTCHours() };
  }
  const fmt = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    hour12: false
  });
  const parts = fmt.formatToParts(date);
  const get = (type: string) => Number(parts.find((p) => p.type === type)?.value ?? "0");
  // en-GB renders midnight as "24" on some runtimes
  return { year: get("year"), month: get("month"), day: get("day"), hour: get("hour") % 24 };
}

export function isValidTimeZone(timeZone: string): boolean {
  if (parseGmtOffsetToMinutes(timeZone) !== null) return true;
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone });
    return true;
  } catch {
    return false;
  }
}

function fmtDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, "0")}-${String(month).padStart(2, "0")}-${String(day).padStart(2, "0")}`;
}

export function localDateString(now: Date, timeZone: string): string {
  const p = getLocalParts(now, timeZone);
  return fmtDate(p.year, p.month, p.day);
}

export function parseCalendarDate(input: string): string | null {
  const m = input.trim().match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const d = new Date(Date.UTC(year, month - 1, day));
  // Rejects 2025-02-30 and friends, which Date.UTC silently rolls over.
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return fmtDate(year, month, day);
}

function toUtcMs(date: string): number {
  return Date.parse(`${date}T00:00:00.000Z`);
}

export function addDays(date: string, days: number): string {
  return new Date(toUtcMs(date) + days * DAY_MS).toISOString().slice(0, 10);
}

export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / DAY_MS);
}

export function dateRange(start: string, end: string): string[] {
  const out: string[] = [];
  for (let d = start; d <= end; d = addDays(d, 1)) out.push(d);
  return out;
}

export function isWithin(date: string, start: string, end: string): boolean {
  return date >= start && date <= end;
}
