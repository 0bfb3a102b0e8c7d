export * from "./sampleReader";
export * from "./reportWriter";
