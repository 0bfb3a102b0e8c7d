export * from "./taxonMatcher";
