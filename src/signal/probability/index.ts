export * from "./probabilityEstimator";
