export * from "./types";
export * from "./runner";
export * from "./analysis/exhaustiveness";
export * from "./passes/wellFormed";
export * from "./passes/unreachableArm";
export * from "./passes/exhaustiveness";
