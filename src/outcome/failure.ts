// src/outcome/failure.ts
// Failure records: what went wrong, why, and what caused it.

import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "pattern-match-exhausted"
  | "capability-violation"
  | "deadlock"
  | "malformed-event"
  | "malformed-term"
  | "type-error"
  | "unbound-variable"
  | "division-by-zero"
  | "integer-overflow"
  | "unknown-method"
  | "timeout"
  | "budget-exceeded"
  | "cancelled"
  | "child-failed";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
  recoverable: boolean;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    recoverable: opts?.recoverable ?? false,
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  reason: FailureReason,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    reason,
    message,
    diagnostics: [],
    recoverable: inner.recoverable,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function isFailureReason(f: Failure, reason: FailureReason): boolean {
  return f.reason === reason;
}

/** Innermost failure of a cause chain. */
export function rootCause(f: Failure): Failure {
  let cur = f;
  while (cur.cause) cur = cur.cause;
  return cur;
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics ?? []) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
