// src/outcome/constructors.ts
// Failure builders for the engine's error taxonomy.

import type { Failure } from "./failure";
import { failure, wrapFailure } from "./failure";
import { makeDiagnostic } from "./codes";

export function typeMismatch(expected: string, actual: string, instanceId?: number): Failure {
  return failure("type-error", `Type mismatch: expected ${expected}, got ${actual}`, {
    diagnostics: [makeDiagnostic("E0100", { expected, actual }, instanceId)],
    context: { expected, actual },
  });
}

export function unboundVariable(name: string, instanceId?: number): Failure {
  return failure("unbound-variable", `Unbound variable: ${name}`, {
    diagnostics: [makeDiagnostic("E0101", { name }, instanceId)],
    context: { name },
  });
}

export function unknownMethod(method: string, type: string, instanceId?: number): Failure {
  return failure("unknown-method", `Unknown method ${method} on ${type}`, {
    diagnostics: [makeDiagnostic("E0102", { method, type }, instanceId)],
    context: { method, type },
  });
}

export function divisionByZero(instanceId?: number): Failure {
  return failure("division-by-zero", "Division by zero", {
    diagnostics: [makeDiagnostic("E0200", undefined, instanceId)],
  });
}

export function integerOverflow(op: string, instanceId?: number): Failure {
  return failure("integer-overflow", `Integer overflow in ${op}`, {
    diagnostics: [makeDiagnostic("E0202", { op }, instanceId)],
    context: { op },
  });
}

export function indexOutOfBounds(index: number, instanceId?: number): Failure {
  return failure("type-error", `Index out of bounds: ${index}`, {
    diagnostics: [makeDiagnostic("E0201", { index }, instanceId)],
    context: { index },
  });
}

export function patternExhausted(value: string, patterns: string[], instanceId?: number): Failure {
  return failure("pattern-match-exhausted", `No pattern matched ${value}`, {
    diagnostics: [makeDiagnostic("E0210", { value }, instanceId)],
    context: { value, patterns },
  });
}

export function capabilityViolation(
  operation: "send" | "receive",
  mode: string,
  channel: string,
  instanceId?: number
): Failure {
  return failure("capability-violation", `Capability violation: ${operation} on bundle ${mode} (${channel})`, {
    diagnostics: [makeDiagnostic("E0220", { operation, mode }, instanceId)],
    context: { operation, mode, channel },
  });
}

export function childFailed(child: number, cause: Failure, instanceId?: number): Failure {
  const wrapped = wrapFailure(cause, "child-failed", `Child instance ${child} failed: ${cause.message}`, { child });
  wrapped.diagnostics.push(makeDiagnostic("E0230", { child }, instanceId));
  return wrapped;
}

export function cancelled(instanceId?: number): Failure {
  return failure("cancelled", "Instance cancelled", {
    diagnostics: [makeDiagnostic("E0240", undefined, instanceId)],
    recoverable: true,
  });
}

export function timedOut(steps: number, instanceId?: number): Failure {
  return failure("timeout", `Timed out after ${steps} steps`, {
    diagnostics: [makeDiagnostic("E0300", { steps }, instanceId)],
    recoverable: true,
  });
}

export function budgetExceeded(resource: string): Failure {
  return failure("budget-exceeded", `Budget exceeded: ${resource}`, {
    diagnostics: [makeDiagnostic("E0301", { resource })],
  });
}

export function deadlocked(blocked: number[]): Failure {
  return failure("deadlock", `Deadlock: ${blocked.length} instance(s) blocked`, {
    diagnostics: [makeDiagnostic("E0302", { count: blocked.length })],
    context: { blocked },
  });
}

export function malformedEvent(detail: string): Failure {
  return failure("malformed-event", `Malformed event: ${detail}`, {
    diagnostics: [makeDiagnostic("E0400", { detail })],
    recoverable: true,
  });
}

export function malformedTerm(detail: string): Failure {
  return failure("malformed-term", `Malformed process term: ${detail}`, {
    diagnostics: [makeDiagnostic("E0401", { detail })],
  });
}
