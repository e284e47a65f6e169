import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ListingHarvesterDefinition } from "../../config";
import { HttpGet } from "../../core/fetch";
import { Logger } from "../../observability";
import { deriveDocumentId, InMemoryExistenceIndex, LocalStore, StoreHandle } from "../../store";
import { ListingHarvester } from "../listingHarvester";
import { makeRecord } from "../recordFactory";

interface FakePage {
  status?: number;
  body: string | Uint8Array;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

function fakeHttp(pages: Record<string, FakePage>): { httpGet: HttpGet; calls: string[] } {
  const calls: string[] = [];
  const httpGet: HttpGet = async (url) => {
    calls.push(url);
    const page = pages[url];
    const status = page ? (page.status ?? 200) : 404;
    let bytes: Uint8Array = new Uint8Array(0);
    if (page !== undefined) {
      bytes = typeof page.body === "string" ? new TextEncoder().encode(page.body) : page.body;
    }
    return {
      ok: status >= 200 && status < 300,
      status,
      text: async () => new TextDecoder().decode(bytes),
      arrayBuffer: async () => toArrayBuffer(bytes),
    };
  };
  return { httpGet, calls };
}

const LISTING_URL = "https://example.org/press";

const LISTING = `
<ul class="news">
  <li><a href="/news/1">In window</a></li>
  <li><a href="/news/2">Too old</a></li>
  <li><a href="/news/3">Undated</a></li>
  <li><a href="/news/4">Broken</a></li>
</ul>`;

const detail = (title: string, date: string | undefined, links = ""): string => `
<html><body>
  <h1>${title}</h1>
  ${date ? `<time datetime="${date}"></time>` : ""}
  <article><p>Body of ${title}.</p></article>
  ${links}
</body></html>`;

const ATTACHMENT_LINKS = `
  <a href="/files/a.pdf">Main</a>
  <a href="/files/small.pdf">Small</a>
  <a href="/files/missing.pdf">Missing</a>`;

const definition: ListingHarvesterDefinition = {
  name: "alpha",
  listingUrl: LISTING_URL,
  linkSelector: ".news a",
  idBasis: "canonical",
  language: "en",
  docType: "press_release",
  requestDelayMs: 0,
  extra: { region: "north" },
};

const START = new Date(2024, 0, 1);
const END = new Date(2024, 0, 8);

let tmpDir: string;
let store: LocalStore;
const logger = new Logger({ component: "test", runId: "run_test" }, { console: false });

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "harvest-listing-"));
  store = new LocalStore(tmpDir, { createIndex: () => new InMemoryExistenceIndex() });
});

afterEach(async () => {
  await store.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function sitePages(): Record<string, FakePage> {
  return {
    [LISTING_URL]: { body: LISTING },
    "https://example.org/news/1": { body: detail("Fresh news", "2024-01-03", ATTACHMENT_LINKS) },
    "https://example.org/news/2": { body: detail("Old news", "2023-12-30") },
    "https://example.org/news/3": { body: detail("Mystery", undefined) },
    "https://example.org/news/4": { status: 500, body: "oops" },
    "https://example.org/files/a.pdf": { body: new Uint8Array(6000) },
    "https://example.org/files/small.pdf": { body: new Uint8Array(10) },
  };
}

describe("ListingHarvester", () => {
  it("returns in-window records with their stored attachments", async () => {
    const { httpGet } = fakeHttp(sitePages());
    const delay = vi.fn(async (_ms: number) => undefined);
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
      delay,
    });

    const records = await harvester.fetchRange(START, END, store);

    expect(records).toEqual([
      {
        documentId: deriveDocumentId("alpha", "https://example.org/news/1", "canonical"),
        source: "alpha",
        url: "https://example.org/news/1",
        title: "Fresh news",
        date: "2024-01-03",
        language: "en",
        docType: "press_release",
        text: "Body of Fresh news.",
        attachmentUrls: [
          "https://example.org/files/a.pdf",
          "https://example.org/files/small.pdf",
          "https://example.org/files/missing.pdf",
        ],
        attachmentPaths: [path.join(tmpDir, "alpha", "attachments", "a.pdf")],
        extra: { region: "north", listingUrl: LISTING_URL },
      },
    ]);
    expect(fs.readFileSync(path.join(tmpDir, "alpha", "attachments", "a.pdf")).byteLength).toBe(6000);
    expect(fs.existsSync(path.join(tmpDir, "alpha", "attachments", "small.pdf"))).toBe(false);
    expect(delay).toHaveBeenCalledTimes(1);
    expect(delay).toHaveBeenCalledWith(0);
  });

  it("skips known documents without fetching them", async () => {
    const { httpGet, calls } = fakeHttp(sitePages());
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
      delay: async () => undefined,
    });
    const documentId = deriveDocumentId("alpha", "https://example.org/news/1", "canonical");
    await store.appendRecord(
      makeRecord({ source: "alpha", documentId, url: "https://example.org/news/1", title: "x", docType: "press_release" }),
    );

    expect(await harvester.fetchRange(START, END, store)).toEqual([]);
    expect(calls).toEqual([
      LISTING_URL,
      "https://example.org/news/2",
      "https://example.org/news/3",
      "https://example.org/news/4",
    ]);
  });

  it("reuses attachments already stored under another URL variant", async () => {
    const { httpGet, calls } = fakeHttp(sitePages());
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
      delay: async () => undefined,
    });
    const existing = await store.storeAttachment(
      "alpha",
      "earlier",
      "https://example.org/files/a.pdf?ts=1",
      new Uint8Array(6000),
    );

    const [record] = await harvester.fetchRange(START, END, store);

    expect(record?.attachmentPaths).toEqual([existing]);
    expect(calls).not.toContain("https://example.org/files/a.pdf");
  });

  it("downloads again when a recorded attachment file is gone", async () => {
    const { httpGet, calls } = fakeHttp(sitePages());
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
      delay: async () => undefined,
    });
    const existing = await store.storeAttachment("alpha", "earlier", "https://example.org/files/a.pdf", new Uint8Array(6000));
    fs.rmSync(existing);

    const [record] = await harvester.fetchRange(START, END, store);

    expect(calls).toContain("https://example.org/files/a.pdf");
    expect(record?.attachmentPaths).toEqual([existing]);
    expect(fs.existsSync(existing)).toBe(true);
  });

  it("keeps the record when an attachment cannot be written", async () => {
    const { httpGet } = fakeHttp(sitePages());
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
      delay: async () => undefined,
    });
    const failingWrites: StoreHandle = {
      hasDocument: (source, documentId) => store.hasDocument(source, documentId),
      hasAttachment: (source, url) => store.hasAttachment(source, url),
      attachmentPath: (source, url) => store.attachmentPath(source, url),
      appendText: (source, documentId, text) => store.appendText(source, documentId, text),
      storeAttachment: async () => {
        throw new Error("ENOSPC: no space left on device");
      },
    };

    const records = await harvester.fetchRange(START, END, failingWrites);

    expect(records.map((record) => [record.url, record.attachmentPaths])).toEqual([["https://example.org/news/1", []]]);
  });

  it("stores attachments whose names are long in bytes", async () => {
    const hangul = "금융위원회보도자료".repeat(10);
    const attachmentUrl = `https://example.org/f/${encodeURIComponent(hangul)}.pdf`;
    const { httpGet } = fakeHttp({
      [LISTING_URL]: { body: '<ul class="news"><li><a href="/news/1">One</a></li><li><a href="/news/2">Two</a></li></ul>' },
      "https://example.org/news/1": { body: detail("Korean notice", "2024-01-03", `<a href="${attachmentUrl}">File</a>`) },
      "https://example.org/news/2": { body: detail("Plain notice", "2024-01-04") },
      [attachmentUrl]: { body: new Uint8Array(6000) },
    });
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
      delay: async () => undefined,
    });

    const records = await harvester.fetchRange(START, END, store);

    expect(records.map((record) => record.url)).toEqual(["https://example.org/news/1", "https://example.org/news/2"]);
    expect(records[0]?.attachmentPaths).toEqual([
      path.join(tmpDir, "alpha", "attachments", `${hangul.slice(0, 83)}.pdf`),
    ]);
  });

  it("fails when the listing cannot be fetched", async () => {
    const { httpGet } = fakeHttp({ [LISTING_URL]: { status: 503, body: "" } });
    const harvester = new ListingHarvester({
      definition,
      httpGet,
      logger,
      requestTimeoutMs: 1000,
      downloadTimeoutMs: 1000,
    });

    await expect(harvester.fetchRange(START, END, store)).rejects.toThrow(
      "HTTP 503 while fetching https://example.org/press",
    );
  });
});
