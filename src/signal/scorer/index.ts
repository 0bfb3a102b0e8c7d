export * from "./scorer";
