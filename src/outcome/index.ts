// src/outcome/index.ts

export * from "./failure";
export * from "./diagnostic";
export * from "./codes";
export * from "./constructors";
