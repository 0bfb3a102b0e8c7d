export * from "./predictSample";
export * from "./runPrediction";
