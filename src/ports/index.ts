// src/ports/index.ts

export * from "./handler";
export * from "./retrieval";
export * from "./script";
