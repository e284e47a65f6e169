export interface DocumentRecord {
  documentId: string;
  source: string;
  url: string;
  title: string;
  /** Calendar date as `YYYY-MM-DD`, or null when the source gives none. */
  date: string | null;
  language: string | null;
  docType: string;
  text: string;
  attachmentUrls: string[];
  attachmentPaths: string[];
  extra: Record<string, unknown>;
}

export interface TimeWindow {
  start: Date;
  end: Date;
}

export type IdBasis = "raw" | "canonical";
