import { format, isValid, parse } from "date-fns";

export type DateParse =
  | { status: "empty" }
  | { status: "parsed"; date: string }
  | { status: "invalid"; raw: string };

// Tried in order; day-first wins for ambiguous numeric dates, as the portal is Indian.
const TEXT_FORMATS = [
  "dd/MM/yyyy",
  "dd-MM-yyyy",
  "dd.MM.yyyy",
  "yyyy/MM/dd",
  "dd MMM yyyy",
  "dd-MMM-yyyy",
  "MMM d, yyyy",
  "d MMMM yyyy",
  "MMMM d, yyyy",
];

const ISO_PREFIX = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:$|[T\s])/;
const MIN_YEAR = 1900;
const MAX_YEAR = 2100;
// Anything this large is an epoch timestamp in milliseconds rather than a year or a day count.
const EPOCH_MS_FLOOR = 100_000_000_000;

function plausible(date: Date): boolean {
  return isValid(date) && date.getFullYear() >= MIN_YEAR && date.getFullYear() <= MAX_YEAR;
}

function fromEpoch(ms: number): DateParse {
  const date = new Date(ms);
  if (!isValid(date)) return { status: "invalid", raw: String(ms) };
  const year = date.getUTCFullYear();
  if (year < MIN_YEAR || year > MAX_YEAR) return { status: "invalid", raw: String(ms) };
  return { status: "parsed", date: date.toISOString().slice(0, 10) };
}

/** Normalizes an upstream date to `YYYY-MM-DD`. */
export function parseUpstreamDate(value: unknown): DateParse {
  if (value === null || value === undefined) return { status: "empty" };
  if (typeof value === "number") {
    return Number.isFinite(value) && Math.abs(value) >= EPOCH_MS_FLOOR
      ? fromEpoch(value)
      : { status: "invalid", raw: String(value) };
  }
  if (typeof value !== "string") return { status: "invalid", raw: JSON.stringify(value) };

  const raw = value.replace(/\s+/g, " ").trim();
  if (!raw || raw === "-" || /^n\/?a$/i.test(raw)) return { status: "empty" };

  if (/^\d+$/.test(raw) && Number(raw) >= EPOCH_MS_FLOOR) {
    return fromEpoch(Number(raw));
  }

  const iso = ISO_PREFIX.exec(raw);
  if (iso) {
    // Date-only portion; any time or zone suffix is dropped so the calendar day is not shifted.
    const date = new Date(Number(iso[1]), Number(iso[2]) - 1, Number(iso[3]));
    const exact =
      date.getFullYear() === Number(iso[1]) &&
      date.getMonth() === Number(iso[2]) - 1 &&
      date.getDate() === Number(iso[3]);
    return exact && plausible(date)
      ? { status: "parsed", date: format(date, "yyyy-MM-dd") }
      : { status: "invalid", raw };
  }

  const reference = new Date(2000, 0, 1);
  for (const pattern of TEXT_FORMATS) {
    const date = parse(raw, pattern, reference);
    if (plausible(date)) {
      return { status: "parsed", date: format(date, "yyyy-MM-dd") };
    }
  }

  return { status: "invalid", raw };
}
