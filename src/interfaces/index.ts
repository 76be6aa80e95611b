export * from "./agents";
export * from "./chunker";
export * from "./embedding";
export * from "./ingestion";
export * from "./retrieval";
export * from "./storage";
