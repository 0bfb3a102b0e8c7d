export * from "./hostContext";
