import crypto from "node:crypto";
import { IdBasis } from "../types";
import { canonicalizeUrl } from "./canonicalize";

function sha1Hex(value: string): string {
  return crypto.createHash("sha1").update(value, "utf-8").digest("hex");
}

/**
 * The basis is fixed per source for its whole lifetime: switching a source
 * from "raw" to "canonical" gives every known document a new id.
 */
export function deriveDocumentId(source: string, url: string, basis: IdBasis, dropKeys?: Iterable<string>): string {
  const keyUrl = basis === "canonical" ? canonicalizeUrl(url, dropKeys) : url;
  return sha1Hex(`${source}|${keyUrl}`);
}

export function deriveAttachmentKey(url: string, dropKeys?: Iterable<string>): string {
  return sha1Hex(canonicalizeUrl(url, dropKeys));
}
