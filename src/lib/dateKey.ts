
function pad2(n: number) {
  return String(n).padStart(2, "0");
}

/**
 * Returns the local calendar date as YYYY-MM-DD.
 * Example: 2026-02-02
 */
export function todayDateKey(d = new Date()): string {
  const y = d.getFullYear();
  const m = pad2(d.getMonth() + 1);
  const day = pad2(d.getDate());
  return `${y}-${m}-${day}`;
}

function parseDateKey(dateKey: string): Date | null {
  const m = dateKey.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) return null;
  const y = Number(m[1]);
  const mo = Number(m[2]);
  const d = Number(m[3]);
  const dt = new Date(Date.UTC(y, mo - 1, d));
  // Date.UTC rolls 2026-02-30 over into March; reject anything that moved.
  if (dt.getUTCFullYear() !== y || dt.getUTCMonth() !== mo - 1 || dt.getUTCDate() !== d) return null;
  return dt;
}

export function isDateKey(value: unknown): value is string {
  return typeof value === "string" && parseDateKey(value) !== null;
}

export function shiftDateKey(dateKey: string, days: number): string {
  const dt = parseDateKey(dateKey);
  if (!dt) return dateKey;
  dt.setUTCDate(dt.getUTCDate() + days);
  return `${dt.getUTCFullYear()}-${pad2(dt.getUTCMonth() + 1)}-${pad2(dt.getUTCDate())}`;
}

export function formatDisplayDate(dateKey: string, locale = "en-US"): string {
  const dt = parseDateKey(dateKey);
  if (!dt) return dateKey;
  return new Intl.DateTimeFormat(locale, { dateStyle: "medium", timeZone: "UTC" }).format(dt);
}
