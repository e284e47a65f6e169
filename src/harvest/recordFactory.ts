import { DocumentRecord } from "../types";
import { toIsoDate } from "./dates";

export interface RecordInput {
  source: string;
  documentId: string;
  url: string;
  title: string;
  date?: Date | string | null;
  language?: string | null;
  docType: string;
  text?: string;
  attachmentUrls?: string[];
  attachmentPaths?: string[];
  extra?: Record<string, unknown>;
}

export function makeRecord(input: RecordInput): DocumentRecord {
  return {
    documentId: input.documentId,
    source: input.source,
    url: input.url,
    title: input.title,
    date: toIsoDate(input.date),
    language: input.language ?? null,
    docType: input.docType,
    text: input.text ?? "",
    attachmentUrls: [...(input.attachmentUrls ?? [])],
    attachmentPaths: [...(input.attachmentPaths ?? [])],
    extra: { ...(input.extra ?? {}) },
  };
}
