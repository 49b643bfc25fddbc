import type { Span } from "../core/span";

export type DiagnosticSeverity = "error";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}
