export * from "./conflicts";
export * from "./github";
export * from "./jobs";
