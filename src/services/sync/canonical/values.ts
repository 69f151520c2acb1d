/**
 * Value normalization shared by the canonical converters and the snapshot
 * loader, so both sides of a comparison use the same representation.
 */

const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T\s])/;

/**
 * Blank or missing strings become null. Non-blank values are kept as written.
 */
export function text(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return value.trim() === "" ? null : value;
}

/**
 * Reduce a date, an ISO instant or a Date to its calendar day (YYYY-MM-DD).
 * The day is taken as written in the string; no time zone shift is applied.
 */
export function toDay(value: string | Date | null | undefined): string | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) return null;
    return formatDay(value.getFullYear(), value.getMonth() + 1, value.getDate());
  }

  const match = DAY_PATTERN.exec(value.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  // Reject rollovers such as 2024-02-31
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }

  return formatDay(year, month, day);
}

/**
 * Normalize a timestamp to an ISO-8601 UTC instant, or null when unparsable
 */
export function toInstant(
  value: string | Date | null | undefined
): string | null {
  if (value === null || value === undefined) return null;
  const time =
    value instanceof Date ? value.getTime() : Date.parse(value.trim());
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

function formatDay(year: number, month: number, day: number): string {
  return [
    String(year).padStart(4, "0"),
    String(month).padStart(2, "0"),
    String(day).padStart(2, "0"),
  ].join("-");
}
