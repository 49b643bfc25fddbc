// src/core/errors.ts
// Error classes. Syntax errors are thrown by the parser; evaluation errors
// travel inside step outcomes.

import type { Diagnostic } from "../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";
import type { Span } from "./span";
import { formatSpan } from "./span";

export class AgentLispError extends Error {
  constructor(message: string, public readonly code: string, public readonly diagnostic: Diagnostic) {
    super(message);
    this.name = "AgentLispError";
  }
}

export class LispSyntaxError extends AgentLispError {
  constructor(diagnostic: Diagnostic) {
    const loc = diagnostic.span ? ` at ${formatSpan(diagnostic.span)}` : "";
    super(`SyntaxError${loc}: ${diagnostic.message}`, diagnostic.code, diagnostic);
    this.name = "LispSyntaxError";
  }
}

export class EvaluationError extends AgentLispError {
  constructor(diagnostic: Diagnostic) {
    super(`EvaluationError: ${diagnostic.message}`, diagnostic.code, diagnostic);
    this.name = "EvaluationError";
  }
}

export class BudgetExceededError extends AgentLispError {
  constructor(public readonly steps: number) {
    const diagnostic = makeDiagnostic("E0301", { steps });
    super(diagnostic.message, diagnostic.code, diagnostic);
    this.name = "BudgetExceededError";
  }
}

export function syntaxError(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): LispSyntaxError {
  return new LispSyntaxError(makeDiagnostic(code, params, span));
}

export function evaluationError(code: DiagnosticCode, params?: Record<string, string | number>): EvaluationError {
  return new EvaluationError(makeDiagnostic(code, params));
}
