/**
 * Accepted date/time layouts for timestamp detection
 */

interface TimestampPattern {
  name: string;
  regex: RegExp;
}

export const TIMESTAMP_PATTERNS: readonly TimestampPattern[] = [
  {
    name: "iso-date",
    regex: /^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})$/,
  },
  {
    name: "iso-datetime",
    regex:
      /^(?<year>\d{4})-(?<month>\d{2})-(?<day>\d{2})[T ](?<hour>\d{2}):(?<minute>\d{2})(?::(?<second>\d{2})(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?$/,
  },
  {
    name: "slash-ymd",
    regex: /^(?<year>\d{4})\/(?<month>\d{1,2})\/(?<day>\d{1,2})$/,
  },
  {
    name: "us-date",
    regex: /^(?<month>\d{1,2})\/(?<day>\d{1,2})\/(?<year>\d{4})$/,
  },
  {
    name: "time",
    regex: /^(?<hour>\d{2}):(?<minute>\d{2}):(?<second>\d{2})$/,
  },
];

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function inRange(raw: string | undefined, min: number, max: number): boolean {
  if (raw === undefined) return true;
  const value = Number(raw);
  return value >= min && value <= max;
}

/**
 * Range-check the captured date and time parts of a match
 */
function isValidParts(groups: Record<string, string | undefined>): boolean {
  const { year, month, day, hour, minute, second } = groups;

  if (!inRange(month, 1, 12)) return false;
  if (day !== undefined) {
    const maxDay =
      year !== undefined && month !== undefined
        ? daysInMonth(Number(year), Number(month))
        : 31;
    if (!inRange(day, 1, maxDay)) return false;
  }

  return inRange(hour, 0, 23) && inRange(minute, 0, 59) && inRange(second, 0, 59);
}

/**
 * Check a trimmed token against the accepted timestamp layouts
 */
export function matchesTimestamp(token: string): boolean {
  for (const pattern of TIMESTAMP_PATTERNS) {
    const match = pattern.regex.exec(token);
    if (match?.groups && isValidParts(match.groups)) {
      return true;
    }
  }
  return false;
}
