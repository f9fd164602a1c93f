// src/core/errors.ts
// Exceptions for API misuse. Failures inside a run are Failure records, never
// exceptions; these are thrown only at the engine's outer surface.

import type { Failure } from "../outcome/failure";

export class EngineError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "EngineError";
  }
}

/** A message offered through inject() did not validate. The store was not touched. */
export class InjectionError extends EngineError {
  constructor(
    message: string,
    public readonly failure: Failure
  ) {
    super(message, "INJECTION_REJECTED");
    this.name = "InjectionError";
  }
}

/** A JSON process term or value did not decode. */
export class DecodeError extends EngineError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message, "DECODE_FAILED");
    this.name = "DecodeError";
  }
}

export class ConfigError extends EngineError {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

/** Engine used out of order, e.g. run() before load(). */
export class EngineStateError extends EngineError {
  constructor(message: string) {
    super(message, "INVALID_STATE");
    this.name = "EngineStateError";
  }
}
