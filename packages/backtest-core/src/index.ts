export * from "./backtestTypes";
export * from "./validation";
export * from "./backtestRunner";
