import { AppConfig } from "../config";
import { createHttpGet, HttpGet } from "../core/fetch";
import { Logger } from "../observability";
import { ListingHarvester } from "./listingHarvester";
import { Harvester } from "./types";

/** Builds the fixed roster from configuration, in configuration order. */
export function buildHarvesters(config: AppConfig, logger: Logger, httpGet?: HttpGet): Harvester[] {
  const get = httpGet ?? createHttpGet({ userAgent: config.userAgent, ignoreHttpsErrors: config.ignoreHttpsErrors });
  return config.harvesters.map(
    (definition) =>
      new ListingHarvester({
        definition,
        httpGet: get,
        logger: logger.child(`harvester:${definition.name}`),
        requestTimeoutMs: config.requestTimeoutMs,
        downloadTimeoutMs: config.downloadTimeoutMs,
        dropQueryKeys: config.dropQueryKeys,
      }),
  );
}
