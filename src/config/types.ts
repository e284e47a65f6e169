import { LogLevel } from "../observability/types";
import { IdBasis } from "../types";

export interface WeeklySchedule {
  /** 0 = Monday ... 6 = Sunday. */
  weekday: number;
  hour: number;
  minute: number;
}

export interface ListingHarvesterDefinition {
  name: string;
  listingUrl: string;
  linkSelector?: string;
  /** Regular expression the absolute detail URL must match. */
  linkPattern?: string;
  maxItems?: number;
  titleSelector?: string;
  dateSelector?: string;
  bodySelector?: string;
  attachmentExtension?: string;
  maxAttachments?: number;
  minAttachmentBytes?: number;
  requestDelayMs?: number;
  idBasis: IdBasis;
  language: string;
  docType: string;
  extra?: Record<string, string>;
}

export interface AppConfig {
  storageRoot: string;
  windowDays: number;
  schedule: WeeklySchedule;
  hourly: boolean;
  backoffSeconds: number;
  logDir: string;
  logLevel: LogLevel;
  userAgent: string;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  dropQueryKeys?: string[];
  harvesters: ListingHarvesterDefinition[];
}

export type ConfigOverrides = Partial<Omit<AppConfig, "schedule">> & {
  schedule?: Partial<WeeklySchedule>;
};
