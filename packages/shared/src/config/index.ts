export * from "./loader";
export type * from "./types";
