import fs from "node:fs";
import { ListingHarvesterDefinition } from "../config";
import { fetchBinary, fetchHtml, HttpGet } from "../core/fetch";
import { sleep } from "../core/sleep";
import { describeError, Logger } from "../observability";
import { deriveDocumentId, StoreHandle } from "../store";
import { DocumentRecord } from "../types";
import { localMidnight } from "./dates";
import { extractDetailLinks, parseDetailPage } from "./htmlParser";
import { makeRecord } from "./recordFactory";
import { Harvester } from "./types";

interface ListingHarvesterDeps {
  definition: ListingHarvesterDefinition;
  httpGet: HttpGet;
  logger: Logger;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  dropQueryKeys?: readonly string[];
  delay?: (ms: number) => Promise<void>;
}

/**
 * Harvests a site shaped as one listing page linking to detail pages, each
 * with a title, a publication date, body text and attachment links.
 */
export class ListingHarvester implements Harvester {
  readonly name: string;
  private readonly definition: ListingHarvesterDefinition;
  private readonly httpGet: HttpGet;
  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly downloadTimeoutMs: number;
  private readonly dropQueryKeys?: readonly string[];
  private readonly delay: (ms: number) => Promise<void>;
  private readonly linkPattern?: RegExp;

  constructor(deps: ListingHarvesterDeps) {
    this.definition = deps.definition;
    this.name = deps.definition.name;
    this.httpGet = deps.httpGet;
    this.logger = deps.logger;
    this.requestTimeoutMs = deps.requestTimeoutMs;
    this.downloadTimeoutMs = deps.downloadTimeoutMs;
    this.dropQueryKeys = deps.dropQueryKeys;
    this.delay = deps.delay ?? ((ms) => sleep(ms));
    this.linkPattern = deps.definition.linkPattern ? new RegExp(deps.definition.linkPattern) : undefined;
  }

  async fetchRange(start: Date, end: Date, store: StoreHandle): Promise<DocumentRecord[]> {
    const definition = this.definition;
    const listingHtml = await fetchHtml(this.httpGet, definition.listingUrl, this.requestTimeoutMs);
    const links = extractDetailLinks(listingHtml, definition.listingUrl, {
      linkSelector: definition.linkSelector ?? "a[href]",
      linkPattern: this.linkPattern,
      maxItems: definition.maxItems ?? 200,
    });
    this.logger.info("listing_parsed", { source: this.name, url: definition.listingUrl, links: links.length });

    const records: DocumentRecord[] = [];
    for (const url of links) {
      const documentId = deriveDocumentId(this.name, url, definition.idBasis, this.dropQueryKeys);
      if (await store.hasDocument(this.name, documentId)) {
        continue;
      }

      let html: string;
      try {
        html = await fetchHtml(this.httpGet, url, this.requestTimeoutMs);
      } catch (error) {
        this.logger.warn("detail_fetch_failed", { source: this.name, url, ...describeError(error) });
        continue;
      }

      const extension = definition.attachmentExtension ?? "pdf";
      const detail = parseDetailPage(html, url, {
        titleSelector: definition.titleSelector,
        dateSelector: definition.dateSelector,
        bodySelector: definition.bodySelector,
        attachmentExtension: extension,
        maxAttachments: definition.maxAttachments ?? 3,
      });

      const published = detail.date ? localMidnight(detail.date) : undefined;
      if (!published) {
        this.logger.debug("detail_undated", { source: this.name, url });
        continue;
      }
      if (published < start || published >= end) {
        continue;
      }

      const text = await store.appendText(this.name, documentId, detail.text);
      const attachmentPaths = await this.storeAttachments(store, documentId, detail.attachmentUrls, extension);

      records.push(
        makeRecord({
          source: this.name,
          documentId,
          url,
          title: detail.title || definition.docType,
          date: detail.date,
          language: definition.language,
          docType: definition.docType,
          text,
          attachmentUrls: detail.attachmentUrls,
          attachmentPaths,
          extra: { ...(definition.extra ?? {}), listingUrl: definition.listingUrl },
        }),
      );
      await this.delay(definition.requestDelayMs ?? 200);
    }

    return records;
  }

  private async storeAttachments(
    store: StoreHandle,
    documentId: string,
    attachmentUrls: string[],
    extension: string,
  ): Promise<string[]> {
    const minBytes = this.definition.minAttachmentBytes ?? 5000;
    const paths: string[] = [];

    for (const [position, attachmentUrl] of attachmentUrls.entries()) {
      if (await store.hasAttachment(this.name, attachmentUrl)) {
        const known = await store.attachmentPath(this.name, attachmentUrl);
        if (known !== undefined && fs.existsSync(known)) {
          paths.push(known);
          continue;
        }
        // recorded but gone from disk: download again so the store can restore it
      }

      let bytes: Uint8Array;
      try {
        bytes = await fetchBinary(this.httpGet, attachmentUrl, this.downloadTimeoutMs);
      } catch (error) {
        this.logger.warn("attachment_download_failed", {
          source: this.name,
          documentId,
          attachmentUrl,
          ...describeError(error),
        });
        continue;
      }
      if (bytes.byteLength < minBytes) {
        this.logger.warn("attachment_too_small", { source: this.name, documentId, attachmentUrl, bytes: bytes.byteLength });
        continue;
      }

      try {
        const storedPath = await store.storeAttachment(this.name, documentId, attachmentUrl, bytes, {
          sequenceHint: position + 1,
          extension,
        });
        paths.push(storedPath);
      } catch (error) {
        this.logger.error("attachment_store_failed", {
          source: this.name,
          documentId,
          attachmentUrl,
          ...describeError(error),
        });
      }
    }
    return paths;
  }
}
