import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ExistenceIndex, IndexStats } from "./types";

type PathRow = {
  path: string;
};

type CountRow = {
  count: number;
};

export class SqliteExistenceIndex implements ExistenceIndex {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const absolutePath = path.resolve(dbPath);
    fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
    this.db = new Database(absolutePath);
    try {
      this.db.pragma("journal_mode = WAL");
      this.initializeSchema();
    } catch (error) {
      // a corrupt file fails here; the handle must not outlive the throw
      this.db.close();
      throw error;
    }
  }

  async hasDocument(documentId: string): Promise<boolean> {
    const row = this.db.prepare("SELECT 1 FROM seen_documents WHERE documentId = ?").get(documentId);
    return row !== undefined;
  }

  async markDocumentSeen(documentId: string): Promise<boolean> {
    const result = this.db
      .prepare(
        `
        INSERT INTO seen_documents (documentId, seenAt)
        VALUES (@documentId, @seenAt)
        ON CONFLICT(documentId) DO NOTHING
      `,
      )
      .run({
        documentId,
        seenAt: new Date().toISOString(),
      });
    return result.changes > 0;
  }

  async hasAttachment(attachmentKey: string): Promise<boolean> {
    const row = this.db.prepare("SELECT 1 FROM seen_attachments WHERE attachmentKey = ?").get(attachmentKey);
    return row !== undefined;
  }

  async attachmentPath(attachmentKey: string): Promise<string | undefined> {
    const row = this.db
      .prepare("SELECT path FROM seen_attachments WHERE attachmentKey = ?")
      .get(attachmentKey) as PathRow | undefined;
    return row?.path;
  }

  async markAttachmentSeen(attachmentKey: string, storedPath: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO seen_attachments (attachmentKey, path, storedAt)
        VALUES (@attachmentKey, @path, @storedAt)
        ON CONFLICT(attachmentKey) DO NOTHING
      `,
      )
      .run({
        attachmentKey,
        path: storedPath,
        storedAt: new Date().toISOString(),
      });
  }

  async getStats(): Promise<IndexStats> {
    return {
      documents: this.count("seen_documents"),
      attachments: this.count("seen_attachments"),
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private count(tableName: "seen_documents" | "seen_attachments"): number {
    const row = this.db.prepare(`SELECT COUNT(*) as count FROM ${tableName}`).get() as CountRow;
    return row.count;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS seen_documents (
        documentId TEXT PRIMARY KEY,
        seenAt TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS seen_attachments (
        attachmentKey TEXT PRIMARY KEY,
        path TEXT NOT NULL,
        storedAt TEXT NOT NULL
      );
    `);
  }
}
