export * from "./http";
export * from "./result";
