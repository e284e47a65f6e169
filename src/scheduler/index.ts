export * from "./schedule";
export * from "./scheduler";
