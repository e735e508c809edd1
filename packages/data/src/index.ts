export * from "./types";
export * from "./quoteParser";
export * from "./fileSnapshotProvider";
export * from "./memoryProvider";
export * from "./snapshot";
