const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

type DateParts = [year: number, month: number, day: number];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function monthNumber(name: string): number | undefined {
  const lowered = name.toLowerCase();
  if (lowered.length < 3) {
    return undefined;
  }
  const index = MONTHS.findIndex((month) => month.startsWith(lowered));
  return index >= 0 ? index + 1 : undefined;
}

function toIso([year, month, day]: DateParts): string | null {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
}

const int = (value: string): number => Number.parseInt(value, 10);

const PATTERNS: Array<{ regex: RegExp; parts: (match: RegExpMatchArray) => DateParts | undefined }> = [
  {
    // 2024-01-03, 2024.01.03, 2024/01/03, 2024-01-03T10:00:00Z
    regex: /\b(\d{4})[-./](\d{1,2})[-./](\d{1,2})(?!\d)/g,
    parts: (m) => [int(m[1]), int(m[2]), int(m[3])],
  },
  {
    // 3rd of January 2024
    regex: /\b(\d{1,2})(?:st|nd|rd|th)?\s+of\s+([A-Za-z]+)\.?,?\s+(\d{4})\b/gi,
    parts: (m) => {
      const month = monthNumber(m[2]);
      return month ? [int(m[3]), month, int(m[1])] : undefined;
    },
  },
  {
    // 3 January 2024, 3 Jan. 2024
    regex: /\b(\d{1,2})(?:st|nd|rd|th)?\s+([A-Za-z]+)\.?,?\s+(\d{4})\b/g,
    parts: (m) => {
      const month = monthNumber(m[2]);
      return month ? [int(m[3]), month, int(m[1])] : undefined;
    },
  },
  {
    // January 3, 2024
    regex: /\b([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/g,
    parts: (m) => {
      const month = monthNumber(m[1]);
      return month ? [int(m[3]), month, int(m[2])] : undefined;
    },
  },
  {
    // 03.01.2024, 03/01/2024 (day first)
    regex: /\b(\d{1,2})[./](\d{1,2})[./](\d{4})\b/g,
    parts: (m) => [int(m[3]), int(m[2]), int(m[1])],
  },
];

/** First recognizable calendar date in free text, as `YYYY-MM-DD`. */
export function parseDateAny(text: string): string | null {
  const normalized = text.replace(/\u00a0/g, " ").replace(/\s+/g, " ").trim();
  if (!normalized) {
    return null;
  }

  // earliest position wins; on a tie, the earlier pattern
  let earliest: { index: number; iso: string } | undefined;
  for (const pattern of PATTERNS) {
    for (const match of normalized.matchAll(pattern.regex)) {
      const index = match.index ?? 0;
      if (earliest && index >= earliest.index) {
        break;
      }
      const parts = pattern.parts(match);
      const iso = parts ? toIso(parts) : null;
      if (iso) {
        earliest = { index, iso };
        break;
      }
    }
  }
  return earliest?.iso ?? null;
}

export function toIsoDate(value: Date | string | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      return null;
    }
    return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
  }
  return parseDateAny(value);
}

/** Local midnight of a `YYYY-MM-DD` date. */
export function localMidnight(isoDate: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(isoDate);
  if (!match) {
    return undefined;
  }
  return new Date(int(match[1]), int(match[2]) - 1, int(match[3]));
}
