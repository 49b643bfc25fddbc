import type { Span } from "../core/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: "Syntax" | "Program" | "Runtime" | "Budget";
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced parentheses: {detail}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "Unterminated string literal" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Reserved word '{name}' cannot be used as an identifier" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "Wrong number of sub-forms for {form}: expected {expected}, got {actual}" },
  E0006: { code: "E0006", severity: "error", category: "Syntax", template: "Integer literal out of range: {text}" },

  E0010: { code: "E0010", severity: "error", category: "Program", template: "Program has no main function" },
  E0011: { code: "E0011", severity: "error", category: "Program", template: "main must take no parameters, got {actual}" },
  E0012: { code: "E0012", severity: "error", category: "Program", template: "Function {name} is defined more than once" },
  E0013: { code: "E0013", severity: "error", category: "Program", template: "Parameter {name} appears more than once in {fn}" },
  E0014: { code: "E0014", severity: "error", category: "Program", template: "let binds {name} more than once" },
  E0015: { code: "E0015", severity: "error", category: "Program", template: "Function table key {key} does not match definition name {name}" },

  E0101: { code: "E0101", severity: "error", category: "Runtime", template: "Undefined variable: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Runtime", template: "Function {name} expects {expected} arguments, got {actual}" },
  E0103: { code: "E0103", severity: "error", category: "Runtime", template: "Undefined function: {name}" },
  E0104: { code: "E0104", severity: "error", category: "Runtime", template: "{name} is a primitive form and cannot be called as a function" },
  E0105: { code: "E0105", severity: "error", category: "Runtime", template: "Primitive {name} expects {expected} arguments, got {actual}" },

  E0301: { code: "E0301", severity: "error", category: "Budget", template: "Step budget exhausted after {steps} steps" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
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
    span,
    data: params,
  };
}
