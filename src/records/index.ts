export * from "./loader";
