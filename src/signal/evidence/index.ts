export * from "./evidenceClassifier";
