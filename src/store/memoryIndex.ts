import { ExistenceIndex, IndexStats } from "./types";

/** Non-durable index with the same contract as the SQLite one; used for tests and throwaway runs. */
export class InMemoryExistenceIndex implements ExistenceIndex {
  private readonly documents = new Set<string>();
  private readonly attachments = new Map<string, string>();

  async hasDocument(documentId: string): Promise<boolean> {
    return this.documents.has(documentId);
  }

  async markDocumentSeen(documentId: string): Promise<boolean> {
    if (this.documents.has(documentId)) {
      return false;
    }
    this.documents.add(documentId);
    return true;
  }

  async hasAttachment(attachmentKey: string): Promise<boolean> {
    return this.attachments.has(attachmentKey);
  }

  async attachmentPath(attachmentKey: string): Promise<string | undefined> {
    return this.attachments.get(attachmentKey);
  }

  async markAttachmentSeen(attachmentKey: string, storedPath: string): Promise<void> {
    if (!this.attachments.has(attachmentKey)) {
      this.attachments.set(attachmentKey, storedPath);
    }
  }

  async getStats(): Promise<IndexStats> {
    return { documents: this.documents.size, attachments: this.attachments.size };
  }

  async close(): Promise<void> {
    return;
  }
}
