/**
 * Timestamps in a configured IANA time zone.
 *
 * Votes are stamped as ISO-8601 local time with the zone's UTC offset,
 * to the second: 2026-10-19T12:04:05+09:00.
 */

interface LocalParts {
  year: string;
  month: string;
  day: string;
  hour: string;
  minute: string;
  second: string;
}

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;
const NAIVE_DATETIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})/;

function localParts(date: Date, timeZone: string): LocalParts {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
  }).formatToParts(date);

  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00";

  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
  };
}

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? "-" : "+";
  const abs = Math.abs(minutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  return `${sign}${hh}:${mm}`;
}

export function formatLocalTimestamp(date: Date, timeZone: string): string {
  const p = localParts(date, timeZone);
  const asUtc = Date.UTC(
    Number(p.year),
    Number(p.month) - 1,
    Number(p.day),
    Number(p.hour),
    Number(p.minute),
    Number(p.second),
  );
  const wholeSeconds = Math.floor(date.getTime() / 1000) * 1000;
  const offset = Math.round((asUtc - wholeSeconds) / 60000);

  return (
    `${p.year}-${p.month}-${p.day}T${p.hour}:${p.minute}:${p.second}` +
    formatOffset(offset)
  );
}

/**
 * Render a stored timestamp as "YYYY-MM-DD HH:MM:SS" in timeZone.
 * Values without an offset are taken to be local time already; anything
 * unparseable is returned unchanged.
 */
export function toDisplayTime(value: string, timeZone: string): string {
  const text = value.trim();
  if (!text) return value;

  if (!OFFSET_SUFFIX.test(text)) {
    const naive = text.match(NAIVE_DATETIME);
    return naive ? `${naive[1]} ${naive[2]}` : value;
  }

  const ms = Date.parse(text);
  if (Number.isNaN(ms)) return value;
  const p = localParts(new Date(ms), timeZone);
  return `${p.year}-${p.month}-${p.day} ${p.hour}:${p.minute}:${p.second}`;
}
