import fs from "node:fs";
import path from "node:path";
import { DocumentRecord } from "../types";
import { AttachmentStore } from "./attachmentStore";
import { SqliteExistenceIndex } from "./existenceIndex";
import { RecordLog } from "./recordLog";
import { ExistenceIndex, IngestStore, SourceStats, StoreAttachmentOptions } from "./types";

const SOURCE_NAME = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const INDEX_FILENAME = "index.sqlite";
export const RECORDS_FILENAME = "records.jsonl";
export const ATTACHMENTS_DIRNAME = "attachments";

export interface LocalStoreOptions {
  dropQueryKeys?: readonly string[];
  createIndex?: (dbPath: string) => ExistenceIndex;
}

interface SourceStorage {
  index: ExistenceIndex;
  attachments: AttachmentStore;
  records: RecordLog;
}

export function assertSourceName(source: string): void {
  if (!SOURCE_NAME.test(source)) {
    throw new Error(`Invalid source name: ${JSON.stringify(source)}`);
  }
}

/**
 * Filesystem store laid out as `<root>/<source>/{index.sqlite, records.jsonl, attachments/}`.
 * Each source gets its own index, opened on first use.
 */
export class LocalStore implements IngestStore {
  readonly root: string;
  private readonly options: LocalStoreOptions;
  private readonly sources = new Map<string, SourceStorage>();

  constructor(root: string, options: LocalStoreOptions = {}) {
    this.root = path.resolve(root);
    this.options = options;
    fs.mkdirSync(this.root, { recursive: true });
  }

  sourceDir(source: string): string {
    assertSourceName(source);
    return path.join(this.root, source);
  }

  async hasDocument(source: string, documentId: string): Promise<boolean> {
    return this.open(source).index.hasDocument(documentId);
  }

  async hasAttachment(source: string, attachmentUrl: string): Promise<boolean> {
    return this.open(source).attachments.has(attachmentUrl);
  }

  async attachmentPath(source: string, attachmentUrl: string): Promise<string | undefined> {
    return this.open(source).attachments.pathFor(attachmentUrl);
  }

  async storeAttachment(
    source: string,
    documentId: string,
    attachmentUrl: string,
    bytes: Uint8Array,
    options?: StoreAttachmentOptions,
  ): Promise<string> {
    return this.open(source).attachments.store(documentId, attachmentUrl, bytes, options);
  }

  /** Bodies are kept inline in the record; this only hands the text back. */
  async appendText(source: string, _documentId: string, text: string): Promise<string> {
    assertSourceName(source);
    return text;
  }

  async appendRecord(record: DocumentRecord): Promise<boolean> {
    return this.open(record.source).records.append(record);
  }

  async readRecords(source: string): Promise<DocumentRecord[]> {
    return this.open(source).records.readAll();
  }

  async listSources(): Promise<string[]> {
    const entries = await fs.promises.readdir(this.root, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory() && SOURCE_NAME.test(entry.name))
      .filter((entry) => fs.existsSync(path.join(this.root, entry.name, INDEX_FILENAME)))
      .map((entry) => entry.name)
      .sort();
  }

  async getStats(source: string): Promise<SourceStats> {
    const stats = await this.open(source).index.getStats();
    return { source, ...stats };
  }

  async close(): Promise<void> {
    const opened = [...this.sources.values()];
    this.sources.clear();
    for (const storage of opened) {
      await storage.index.close();
    }
  }

  private open(source: string): SourceStorage {
    const existing = this.sources.get(source);
    if (existing) {
      return existing;
    }

    const dir = this.sourceDir(source);
    fs.mkdirSync(path.join(dir, ATTACHMENTS_DIRNAME), { recursive: true });
    const dbPath = path.join(dir, INDEX_FILENAME);
    // not cached until it opens, so a broken index is retried on the next call
    const index = this.options.createIndex ? this.options.createIndex(dbPath) : new SqliteExistenceIndex(dbPath);
    const storage: SourceStorage = {
      index,
      attachments: new AttachmentStore({
        directory: path.join(dir, ATTACHMENTS_DIRNAME),
        index,
        dropQueryKeys: this.options.dropQueryKeys,
      }),
      records: new RecordLog({ filePath: path.join(dir, RECORDS_FILENAME), index }),
    };
    this.sources.set(source, storage);
    return storage;
  }
}
