// src/index.ts
// AgentLisp - Public API
//
// Parser and small-step evaluator. Drivers parse a program, build the initial
// state, and call `step` until it completes, fails, or asks for a system call.

// ═══════════════════════════════════════════════════════════════════════════════
// SYNTAX
// ═══════════════════════════════════════════════════════════════════════════════

export type { Expr, LetBinding, FunctionDef, Program, PrimOp } from "./core/ast";
export { PRIM_ARITY, PRIM_OPS, KEYWORDS, isPrimOp, lit, v, ifE, letE, call, prim, defun, program } from "./core/ast";
export type { Span } from "./core/span";
export { parseProgram, tryParseProgram, validateProgram, type ParseOptions } from "./core/pipeline/compileText";
export { exprToSource, definitionToSource, programToSource, showVal } from "./core/printer";

// ═══════════════════════════════════════════════════════════════════════════════
// MACHINE
// ═══════════════════════════════════════════════════════════════════════════════

export type { Val, Truthiness } from "./core/eval/values";
export { isTruthy, valueToString } from "./core/eval/values";
export type { Env } from "./core/eval/env";
export { envEmpty, envExtend, envGet, envHas, envBindings } from "./core/eval/env";
export type { Computing, Interop, State, StepOutcome, StateView, Frame, Control } from "./core/eval/machine";
export { step, resume, initialState, type StepOptions } from "./core/eval/machineStep";
export { inspectState, inspectOutcome, pendingSysCall, describeSysCall, describeOutcome } from "./core/eval/inspect";
export type { SysCall, SysCallTag } from "./core/effects/syscall";
export { resumeValue, syscallPayload } from "./core/effects/syscall";

// ═══════════════════════════════════════════════════════════════════════════════
// DRIVER HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  runSteps,
  runUntilBlocked,
  runToCompletion,
  runWithTrace,
  evaluateProgram,
  formatTrace,
  runOptionsFromConfig,
  type SysCallHandler,
  type RunOptions,
  type RunResult,
  type TraceEntry,
  type TraceOptions,
} from "./core/eval/run";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export { AgentLispError, LispSyntaxError, EvaluationError, BudgetExceededError } from "./core/errors";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export type { Failure, FailureReason } from "./outcome/failure";
export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export { match, mapOutcome, unwrap, unwrapOr } from "./outcome/matchers";
