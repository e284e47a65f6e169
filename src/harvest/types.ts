import { StoreHandle } from "../store/types";
import { DocumentRecord } from "../types";

/**
 * Produces the candidate records of one source for a time window. It may query
 * the store to skip known documents and must store attachment bytes itself;
 * records are appended by the caller.
 */
export interface Harvester {
  readonly name: string;
  fetchRange(start: Date, end: Date, store: StoreHandle): Promise<DocumentRecord[]>;
}
