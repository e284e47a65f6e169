const GENERIC_LAST_SEGMENTS = new Set([
  "",
  "download",
  "file",
  "get",
  "print",
  "view",
  "open",
  "attachment",
  "document",
  "content",
  "pdf",
  "export",
]);

const FILE_LIKE_SEGMENT = /^[A-Za-z0-9][A-Za-z0-9._-]{2,}$/;

export const DEFAULT_MAX_FILENAME_LENGTH = 160;
/** Filesystems cap a single path component at 255 bytes, not characters. */
export const MAX_FILENAME_BYTES = 255;

function percentDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // malformed escape sequences are kept verbatim
    return value;
  }
}

/** Cuts on code points until the name fits both `maxLength` characters and `MAX_FILENAME_BYTES` UTF-8 bytes. */
function truncateKeepingExtension(name: string, maxLength: number): string {
  const chars = Array.from(name);
  if (chars.length <= maxLength && Buffer.byteLength(name, "utf-8") <= MAX_FILENAME_BYTES) {
    return name;
  }

  const dot = name.lastIndexOf(".");
  let ext = dot > 0 ? name.slice(dot) : "";
  if (Buffer.byteLength(ext, "utf-8") >= MAX_FILENAME_BYTES / 2) {
    ext = "";
  }
  const extChars = Array.from(ext).length;
  const extBytes = Buffer.byteLength(ext, "utf-8");

  let base = chars.slice(0, chars.length - extChars).slice(0, Math.max(0, maxLength - extChars));
  while (base.length > 0 && Buffer.byteLength(base.join(""), "utf-8") + extBytes > MAX_FILENAME_BYTES) {
    base = base.slice(0, -1);
  }
  return base.join("") + ext;
}

/** Returns undefined when nothing usable is left. */
export function safeFilename(name: string, maxLength = DEFAULT_MAX_FILENAME_LENGTH): string | undefined {
  let cleaned = percentDecode(name.trim());
  cleaned = cleaned.replace(/[\u0000-\u001f\u007f]/g, "");
  cleaned = cleaned.replace(/[^\p{L}\p{N}_.\-() ]+/gu, "_");
  cleaned = cleaned.replace(/\s+/g, " ").trim();

  cleaned = truncateKeepingExtension(cleaned, maxLength);

  if (!cleaned || /^\.+$/.test(cleaned)) {
    return undefined;
  }
  return cleaned;
}

function lastPathSegment(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const segments = pathname.split("/");
  return percentDecode(segments[segments.length - 1] ?? "").trim();
}

/** Human-readable name from the URL's last segment, when it plausibly names a file. */
export function filenameFromUrl(url: string, extension: string): string | undefined {
  const last = lastPathSegment(url);
  const suffix = `.${extension.toLowerCase()}`;

  if (last.toLowerCase().endsWith(suffix) && last.length > suffix.length) {
    return safeFilename(last);
  }

  if (!GENERIC_LAST_SEGMENTS.has(last.toLowerCase()) && FILE_LIKE_SEGMENT.test(last)) {
    return safeFilename(`${last}.${extension}`);
  }

  return undefined;
}

export function attachmentFilename(
  url: string,
  documentId: string,
  extension: string,
  sequenceHint?: number,
): string {
  const fromUrl = filenameFromUrl(url, extension);
  if (fromUrl) {
    return fromUrl;
  }
  const base = sequenceHint !== undefined && sequenceHint > 1 ? `${documentId}-${sequenceHint}` : documentId;
  return safeFilename(`${base}.${extension}`) ?? `${documentId}.bin`;
}
