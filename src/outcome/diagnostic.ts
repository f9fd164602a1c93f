// src/outcome/diagnostic.ts
// Diagnostics attached to failures and run reports.

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Instance the diagnostic concerns, when there is one */
  instanceId?: number;
  data?: Record<string, unknown>;
  related?: Diagnostic[];
}
