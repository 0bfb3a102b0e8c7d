export * from "./logger";
export * from "./scoring";
export * from "./taxonomy";
export * from "./host";
export * from "./evidence";
export * from "./records";
export * from "./io";
export * from "./runner";
