export * from "./bindings";
export * from "./fieldReader";
export * from "./matcher";
