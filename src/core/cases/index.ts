export * from "./types";
export * from "./selector";
