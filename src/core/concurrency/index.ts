// src/core/concurrency/index.ts
// Channel store, scheduler and run analysis

export * from "./store";
export * from "./types";
export * from "./scheduler";
export * from "./critic";
