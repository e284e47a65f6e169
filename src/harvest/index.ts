export * from "./dates";
export * from "./htmlParser";
export * from "./listingHarvester";
export * from "./recordFactory";
export * from "./registry";
export * from "./types";
