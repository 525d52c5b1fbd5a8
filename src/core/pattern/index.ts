export * from "./pattern";
export * from "./names";
export * from "./show";
export * from "./validate";
