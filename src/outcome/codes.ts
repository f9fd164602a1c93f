// src/outcome/codes.ts

import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0100: { code: "E0100", severity: "error", category: "Type", template: "Type mismatch: expected {expected}, got {actual}" },
  E0101: { code: "E0101", severity: "error", category: "Type", template: "Unbound variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Type", template: "Unknown method {method} on {type}" },

  E0200: { code: "E0200", severity: "error", category: "Runtime", template: "Division by zero" },
  E0201: { code: "E0201", severity: "error", category: "Runtime", template: "Index out of bounds: {index}" },
  E0202: { code: "E0202", severity: "error", category: "Runtime", template: "Integer overflow in {op}" },
  E0210: { code: "E0210", severity: "error", category: "Runtime", template: "No pattern matched {value}" },
  E0220: { code: "E0220", severity: "error", category: "Capability", template: "Capability violation: {operation} on bundle {mode}" },
  E0230: { code: "E0230", severity: "error", category: "Runtime", template: "Child instance {child} failed" },
  E0240: { code: "E0240", severity: "error", category: "Runtime", template: "Instance cancelled" },

  E0300: { code: "E0300", severity: "error", category: "Scheduler", template: "Timed out after {steps} steps" },
  E0301: { code: "E0301", severity: "error", category: "Scheduler", template: "Budget exceeded: {resource}" },
  E0302: { code: "E0302", severity: "error", category: "Scheduler", template: "Deadlock: {count} instance(s) blocked" },

  E0400: { code: "E0400", severity: "error", category: "Validation", template: "Malformed event: {detail}" },
  E0401: { code: "E0401", severity: "error", category: "Validation", template: "Malformed process term: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Scheduler", template: "{count} persistent listener(s) still registered" },
  W0002: { code: "W0002", severity: "warning", category: "Runtime", template: "Unused message on {channel}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  instanceId?: number
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    instanceId,
    data: params,
  };
}
