// src/core/codec/index.ts
export { ProcSchema, ValueSchema, decodeProcess, decodeValue, parseProcess, parseJson } from "./decode";
