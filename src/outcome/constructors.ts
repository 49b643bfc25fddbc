import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import type { Diagnostic } from "./diagnostic";
import { makeDiagnostic } from "./codes";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function syntaxFailure(diagnostic: Diagnostic, meta: OutcomeMeta = {}): Fail {
  return fail(
    failure("syntax-error", diagnostic.message, [diagnostic]),
    { span: diagnostic.span, ...meta }
  );
}

export function evaluationFailure(diagnostic: Diagnostic, meta: OutcomeMeta = {}): Fail {
  return fail(failure("evaluation-error", diagnostic.message, [diagnostic]), meta);
}

export function budgetExceeded(steps: number, meta: OutcomeMeta = {}): Fail {
  const diag = makeDiagnostic("E0301", { steps });
  return fail(failure("budget-exceeded", diag.message, [diag]), { steps, ...meta });
}
