export * from "./logger";
export * from "./taxonomy";
export * from "./evidence";
export * from "./records";
export * from "./host";
export * from "./scoring";
export * from "./prediction";
export * from "./runner";
