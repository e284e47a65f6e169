import crypto from "node:crypto";
import { describe, it, expect } from "vitest";
import { deriveAttachmentKey, deriveDocumentId } from "../identifiers";

const sha1 = (value: string): string => crypto.createHash("sha1").update(value, "utf-8").digest("hex");

describe("deriveDocumentId", () => {
  it("hashes source and raw URL", () => {
    const url = "https://example.org/news/1?ts=5";
    expect(deriveDocumentId("alpha", url, "raw")).toBe(sha1(`alpha|${url}`));
  });

  it("hashes source and canonical URL", () => {
    expect(deriveDocumentId("alpha", "https://example.org/news/1?ts=5", "canonical")).toBe(
      sha1("alpha|https://example.org/news/1"),
    );
  });

  it("separates sources publishing the same URL", () => {
    const url = "https://example.org/news/1";
    expect(deriveDocumentId("alpha", url, "raw")).not.toBe(deriveDocumentId("beta", url, "raw"));
  });

  it("only collapses cache-busting variants under the canonical basis", () => {
    const a = "https://example.org/news/1?ts=1";
    const b = "https://example.org/news/1?ts=2";
    expect(deriveDocumentId("alpha", a, "canonical")).toBe(deriveDocumentId("alpha", b, "canonical"));
    expect(deriveDocumentId("alpha", a, "raw")).not.toBe(deriveDocumentId("alpha", b, "raw"));
  });
});

describe("deriveAttachmentKey", () => {
  it("is the same for URLs differing only in cache-busting parameters", () => {
    expect(deriveAttachmentKey("https://example.org/f/report.pdf?ts=123")).toBe(
      deriveAttachmentKey("https://example.org/f/report.pdf?ts=456"),
    );
  });

  it("is the sha1 of the canonical URL", () => {
    expect(deriveAttachmentKey("https://example.org/f/report.pdf?b=1&a=2")).toBe(
      sha1("https://example.org/f/report.pdf?a=2&b=1"),
    );
  });
});
