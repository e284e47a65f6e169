export const DEFAULT_DROP_QUERY_KEYS: readonly string[] = [
  "_",
  "ts",
  "timestamp",
  "t",
  "v",
  "ver",
  "version",
  "cb",
  "cachebust",
  "cachebuster",
  "nocache",
  "rnd",
  "random",
  "download",
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
];

function compareCodeUnits(a: string, b: string): number {
  if (a < b) {
    return -1;
  }
  return a > b ? 1 : 0;
}

function stripFragment(value: string): string {
  const hashIndex = value.indexOf("#");
  return hashIndex >= 0 ? value.slice(0, hashIndex) : value;
}

/**
 * Normalizes a URL into a comparison key: tracking and cache-busting query
 * parameters removed, the rest sorted by key then value, fragment dropped.
 */
export function canonicalizeUrl(raw: string, dropKeys?: Iterable<string>): string;
export function canonicalizeUrl(
  raw: string | null | undefined,
  dropKeys?: Iterable<string>,
): string | null | undefined;
export function canonicalizeUrl(
  raw: string | null | undefined,
  dropKeys: Iterable<string> = DEFAULT_DROP_QUERY_KEYS,
): string | null | undefined {
  if (raw === null || raw === undefined || raw === "") {
    return raw;
  }

  const trimmed = raw.trim();
  if (!trimmed) {
    return "";
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return stripFragment(trimmed);
  }

  const drop = new Set([...dropKeys].map((key) => key.toLowerCase()));
  const kept: Array<[string, string]> = [];
  for (const [key, value] of parsed.searchParams) {
    const lowered = key.toLowerCase();
    if (drop.has(lowered) || lowered.startsWith("utm_")) {
      continue;
    }
    kept.push([key, value]);
  }
  kept.sort((a, b) => compareCodeUnits(a[0], b[0]) || compareCodeUnits(a[1], b[1]));

  const query = new URLSearchParams(kept).toString();
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}${query ? `?${query}` : ""}`;
}
