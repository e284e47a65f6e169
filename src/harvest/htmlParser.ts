import { load } from "cheerio";
import { parseDateAny } from "./dates";

export interface DetailPage {
  title: string;
  date: string | null;
  text: string;
  attachmentUrls: string[];
}

export interface DetailSelectors {
  titleSelector?: string;
  dateSelector?: string;
  bodySelector?: string;
  attachmentExtension: string;
  maxAttachments: number;
}

const BODY_FALLBACKS = ["article", "main", ".content", ".article-body", ".post-content", "body"];
const DATE_FALLBACKS = [".date", ".field--name-created", ".submitted", ".article-date"];

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function normalizeUrl(baseUrl: string, href: string): string | undefined {
  try {
    const resolved = new URL(href, baseUrl);
    if (resolved.protocol !== "http:" && resolved.protocol !== "https:") {
      return undefined;
    }
    resolved.hash = "";
    return resolved.toString();
  } catch {
    return undefined;
  }
}

export function extractDetailLinks(
  html: string,
  pageUrl: string,
  options: { linkSelector: string; linkPattern?: RegExp; maxItems: number },
): string[] {
  const $ = load(html);
  const links: string[] = [];
  const seen = new Set<string>();

  $(options.linkSelector).each((_, element) => {
    if (links.length >= options.maxItems) {
      return false;
    }
    const href = $(element).attr("href");
    const url = href ? normalizeUrl(pageUrl, href.trim()) : undefined;
    if (!url || seen.has(url)) {
      return;
    }
    if (options.linkPattern && !options.linkPattern.test(url)) {
      return;
    }
    seen.add(url);
    links.push(url);
  });

  return links;
}

export function parseDetailPage(html: string, pageUrl: string, selectors: DetailSelectors): DetailPage {
  const $ = load(html);

  const titleCandidates = [selectors.titleSelector, "h1"].filter((s): s is string => Boolean(s));
  let title = "";
  for (const selector of titleCandidates) {
    title = sanitizeText($(selector).first().text());
    if (title) {
      break;
    }
  }
  if (!title) {
    title = sanitizeText($("title").first().text());
  }

  let date: string | null = null;
  if (selectors.dateSelector) {
    date = parseDateAny($(selectors.dateSelector).first().text());
  }
  if (!date) {
    $("time").each((_, element) => {
      date = parseDateAny($(element).attr("datetime") ?? "") ?? parseDateAny($(element).text());
      return date ? false : undefined;
    });
  }
  for (const selector of DATE_FALLBACKS) {
    if (date) {
      break;
    }
    date = parseDateAny($(selector).first().text());
  }

  const bodyCandidates = [selectors.bodySelector, ...BODY_FALLBACKS].filter((s): s is string => Boolean(s));
  const container = bodyCandidates.map((selector) => $(selector).first()).find((node) => node.length > 0);
  let text = "";
  if (container) {
    container.find("script, style, noscript").remove();
    const parts: string[] = [];
    container.find("p, li").each((_, element) => {
      const part = sanitizeText($(element).text());
      if (part) {
        parts.push(part);
      }
    });
    text = parts.length > 0 ? parts.join("\n\n") : sanitizeText(container.text());
  }

  if (!date) {
    date = parseDateAny($("body").text());
  }

  const suffix = `.${selectors.attachmentExtension.toLowerCase()}`;
  const attachmentUrls: string[] = [];
  $("a[href]").each((_, element) => {
    if (attachmentUrls.length >= selectors.maxAttachments) {
      return false;
    }
    const url = normalizeUrl(pageUrl, ($(element).attr("href") ?? "").trim());
    if (!url || attachmentUrls.includes(url)) {
      return;
    }
    const pathname = new URL(url).pathname.toLowerCase();
    if (pathname.endsWith(suffix)) {
      attachmentUrls.push(url);
    }
  });

  return { title, date, text, attachmentUrls };
}
