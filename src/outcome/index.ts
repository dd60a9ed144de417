// src/outcome/index.ts

export * from "./outcome";
export * from "./failure";
export * from "./constructors";
export * from "./matchers";
