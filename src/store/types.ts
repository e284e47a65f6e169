import { DocumentRecord } from "../types";

export interface IndexStats {
  documents: number;
  attachments: number;
}

/** Per-source record of what has already been persisted. One instance per source. */
export interface ExistenceIndex {
  hasDocument(documentId: string): Promise<boolean>;
  /** Resolves true only when the id was not yet present. */
  markDocumentSeen(documentId: string): Promise<boolean>;
  hasAttachment(attachmentKey: string): Promise<boolean>;
  attachmentPath(attachmentKey: string): Promise<string | undefined>;
  /** Insert-if-absent: the first recorded path for a key is kept. */
  markAttachmentSeen(attachmentKey: string, storedPath: string): Promise<void>;
  getStats(): Promise<IndexStats>;
  close(): Promise<void>;
}

export interface StoreAttachmentOptions {
  /** 1-based position of the attachment within its document. */
  sequenceHint?: number;
  extension?: string;
}

/** The part of the store a harvester may use. */
export interface StoreHandle {
  hasDocument(source: string, documentId: string): Promise<boolean>;
  hasAttachment(source: string, attachmentUrl: string): Promise<boolean>;
  attachmentPath(source: string, attachmentUrl: string): Promise<string | undefined>;
  storeAttachment(
    source: string,
    documentId: string,
    attachmentUrl: string,
    bytes: Uint8Array,
    options?: StoreAttachmentOptions,
  ): Promise<string>;
  appendText(source: string, documentId: string, text: string): Promise<string>;
}

export interface SourceStats extends IndexStats {
  source: string;
}

export interface IngestStore extends StoreHandle {
  /** Resolves false when the record was already persisted. */
  appendRecord(record: DocumentRecord): Promise<boolean>;
  listSources(): Promise<string[]>;
  getStats(source: string): Promise<SourceStats>;
  close(): Promise<void>;
}
