export * from "./value";
export * from "./show";
export * from "./host";
