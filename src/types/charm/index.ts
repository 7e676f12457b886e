export * from "./event";
export * from "./layer";
export * from "./status";
