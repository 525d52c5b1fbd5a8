export * from "./outcome";
export * from "./failure";
export * from "./diagnostic";
export * from "./codes";
export * from "./constructors";
export * from "./matchers";
export * from "./errors";
