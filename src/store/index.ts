import { AppConfig } from "../config";
import { LocalStore } from "./localStore";

export function createStore(config: AppConfig): LocalStore {
  return new LocalStore(config.storageRoot, { dropQueryKeys: config.dropQueryKeys });
}

export * from "./attachmentStore";
export * from "./canonicalize";
export * from "./existenceIndex";
export * from "./filenames";
export * from "./identifiers";
export * from "./localStore";
export * from "./memoryIndex";
export * from "./recordLog";
export * from "./types";
