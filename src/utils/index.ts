/**
 * Utils barrel exports
 */

export * from "./taxonomy";
export * from "./tsv";
export * from "./recordValidation";
