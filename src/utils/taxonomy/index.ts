export * from "./taxonLabel";
