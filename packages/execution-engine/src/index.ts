export * from "./fills";
export * from "./settings";
export * from "./positionLedger";
