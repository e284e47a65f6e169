import fs from "node:fs";
import path from "node:path";
import { DocumentRecord } from "../types";
import { ExistenceIndex } from "./types";

interface RecordLogDeps {
  filePath: string;
  index: ExistenceIndex;
}

/**
 * Append-only JSONL log of one source's records.
 *
 * The document is marked seen before its line is written. A crash in between
 * leaves a "seen" entry with no line, so a record can go missing but is never
 * written twice.
 */
export class RecordLog {
  readonly filePath: string;
  private readonly index: ExistenceIndex;

  constructor(deps: RecordLogDeps) {
    this.filePath = path.resolve(deps.filePath);
    this.index = deps.index;
  }

  async append(record: DocumentRecord): Promise<boolean> {
    const inserted = await this.index.markDocumentSeen(record.documentId);
    if (!inserted) {
      return false;
    }

    const line = JSON.stringify({
      documentId: record.documentId,
      source: record.source,
      url: record.url,
      title: record.title,
      date: record.date,
      language: record.language,
      docType: record.docType,
      text: record.text,
      attachmentUrls: record.attachmentUrls,
      attachmentPaths: record.attachmentPaths,
      extra: record.extra,
    });
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.promises.appendFile(this.filePath, line + "\n", "utf-8");
    return true;
  }

  async readAll(): Promise<DocumentRecord[]> {
    if (!fs.existsSync(this.filePath)) {
      return [];
    }
    const raw = await fs.promises.readFile(this.filePath, "utf-8");
    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => JSON.parse(line) as DocumentRecord);
  }
}
