import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "syntax-error"
  | "evaluation-error"
  | "budget-exceeded"
  | "blocked";

export interface Failure {
  reason: FailureReason;
  message: string;
  diagnostics: Diagnostic[];
}

export function failure(reason: FailureReason, message: string, diagnostics: Diagnostic[] = []): Failure {
  return { reason, message, diagnostics };
}
