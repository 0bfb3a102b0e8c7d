export * from "./aggregateFunctions";
