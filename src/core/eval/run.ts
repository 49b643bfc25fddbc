// src/core/eval/run.ts
// Loops over `step` for drivers. Nothing here performs I/O: system calls go
// to the handler the caller passes in.

import type { Expr, Program } from "../ast";
import type { State, StepOutcome } from "./machine";
import type { Val } from "./values";
import { step, initialState } from "./machineStep";
import type { SysCall, SysCallTag } from "../effects/syscall";
import type { AgentLispConfig, EvalPolicy } from "../config/config";
import { DEFAULT_RUNTIME_CONFIG } from "../config/config";
import { BudgetExceededError, LispSyntaxError } from "../errors";
import { describeSysCall } from "./inspect";
import { showVal } from "../printer";
import type { Outcome } from "../../outcome/outcome";
import { budgetExceeded, done, evaluationFailure, fail, syntaxFailure } from "../../outcome/constructors";
import { failure } from "../../outcome/failure";

/**
 * Supplies the result of a system call. Returning `undefined` declines,
 * leaving the program blocked on that call.
 */
export type SysCallHandler = (call: SysCall) => string | undefined | Promise<string | undefined>;

export type RunOptions = {
  maxSteps?: number;
  policy?: EvalPolicy;
};

export type RunResult = {
  outcome: StepOutcome;
  steps: number;
};

export function runOptionsFromConfig(config: AgentLispConfig): RunOptions {
  return { maxSteps: config.runtime.maxEvalSteps, policy: config.policy };
}

/**
 * Take at most `count` steps, stopping early at an Interop state, completion
 * or an error. Starting from an Interop state takes no steps.
 */
export function runSteps(program: Program, state: State, count: number, options: RunOptions = {}): RunResult {
  let out: StepOutcome = { tag: "State", state };
  let steps = 0;

  while (steps < count && out.tag === "State" && out.state.tag === "Computing") {
    out = step(program, out.state, undefined, { policy: options.policy });
    steps++;
  }
  return { outcome: out, steps };
}

/** Step until the program needs the driver, finishes, or fails. */
export function runUntilBlocked(program: Program, state: State, options: RunOptions = {}): RunResult {
  const maxSteps = options.maxSteps ?? DEFAULT_RUNTIME_CONFIG.maxEvalSteps;
  const res = runSteps(program, state, maxSteps, options);
  if (res.outcome.tag === "State" && res.outcome.state.tag === "Computing") {
    throw new BudgetExceededError(maxSteps);
  }
  return res;
}

// ============================================================================
// TRACING INFRASTRUCTURE
// ============================================================================

export type TraceEntry = {
  step: number;
  controlTag: "Expr" | "Val" | "Interop";
  controlDetail: string;
  stackDepth: number;
  stackTags: string[];
  outcome: "state" | "interop" | "done" | "error";
  syscall?: SysCallTag;
};

export type TraceOptions = RunOptions & {
  onStep?: (entry: TraceEntry) => void;
};

function exprDetail(e: Expr): string {
  switch (e.tag) {
    case "Lit": return `Lit(${showVal(e.value)})`;
    case "Var": return `Var(${e.name})`;
    case "If": return "If";
    case "Let": return `Let(${e.bindings.map(b => b.name).join(",")})`;
    case "Call": return `Call(${e.fn}/${e.args.length})`;
    case "Prim": return `Prim(${e.op})`;
  }
}

function controlToString(state: State): { tag: TraceEntry["controlTag"]; detail: string } {
  if (state.tag === "Interop") return { tag: "Interop", detail: describeSysCall(state.syscall) };
  const c = state.control;
  if (c.tag === "Val") return { tag: "Val", detail: showVal(c.v) };
  return { tag: "Expr", detail: exprDetail(c.e) };
}

function outcomeKind(out: StepOutcome): TraceEntry["outcome"] {
  if (out.tag === "Done") return "done";
  if (out.tag === "Error") return "error";
  return out.state.tag === "Interop" ? "interop" : "state";
}

function traceEntry(i: number, st: State, out: StepOutcome): TraceEntry {
  const { tag, detail } = controlToString(st);
  const kont = st.tag === "Interop" ? st.continuation.kont : st.kont;
  return {
    step: i,
    controlTag: tag,
    controlDetail: detail,
    stackDepth: kont.length,
    stackTags: kont.map(fr => fr.tag),
    outcome: outcomeKind(out),
    syscall: out.tag === "State" && out.state.tag === "Interop" ? out.state.syscall.tag : undefined,
  };
}

async function drive(
  program: Program,
  initial: State,
  handler: SysCallHandler,
  options: TraceOptions
): Promise<RunResult> {
  const maxSteps = options.maxSteps ?? DEFAULT_RUNTIME_CONFIG.maxEvalSteps;

  let st = initial;
  for (let i = 0; i < maxSteps; i++) {
    let input: string | undefined;
    if (st.tag === "Interop") {
      input = await handler(st.syscall);
      if (input === undefined) return { outcome: { tag: "State", state: st }, steps: i };
    }

    const out = step(program, st, input, { policy: options.policy });
    options.onStep?.(traceEntry(i, st, out));

    if (out.tag !== "State") return { outcome: out, steps: i + 1 };
    st = out.state;
  }

  throw new BudgetExceededError(maxSteps);
}

/**
 * Run until the program completes or fails, asking `handler` for every
 * system call. Stops early, blocked, if the handler declines a call.
 */
export async function runToCompletion(
  program: Program,
  initial: State,
  handler: SysCallHandler,
  options: RunOptions = {}
): Promise<RunResult> {
  return drive(program, initial, handler, options);
}

/**
 * Like runToCompletion but also returns one TraceEntry per step.
 */
export async function runWithTrace(
  program: Program,
  initial: State,
  handler: SysCallHandler,
  options: TraceOptions = {}
): Promise<RunResult & { trace: TraceEntry[] }> {
  const trace: TraceEntry[] = [];
  const res = await drive(program, initial, handler, {
    ...options,
    onStep: entry => {
      trace.push(entry);
      options.onStep?.(entry);
    },
  });
  return { ...res, trace };
}

/**
 * Run `main` from the start and fold the result into an Outcome. A program
 * without a valid `main` comes back as a syntax-error Fail.
 */
export async function evaluateProgram(
  program: Program,
  handler: SysCallHandler,
  options: RunOptions = {}
): Promise<Outcome<Val>> {
  let res: RunResult;
  try {
    res = await runToCompletion(program, initialState(program), handler, options);
  } catch (e) {
    if (e instanceof BudgetExceededError) return budgetExceeded(e.steps);
    if (e instanceof LispSyntaxError) return syntaxFailure(e.diagnostic);
    throw e;
  }

  const out = res.outcome;
  switch (out.tag) {
    case "Done":
      return done(out.value, { steps: res.steps });
    case "Error":
      return evaluationFailure(out.error.diagnostic, { steps: res.steps });
    case "State": {
      const pending = out.state.tag === "Interop" ? describeSysCall(out.state.syscall) : "Computing";
      return fail(failure("blocked", `Program blocked: ${pending}`), { steps: res.steps });
    }
  }
}

/**
 * Format trace for human-readable output
 */
export function formatTrace(trace: TraceEntry[], options?: { compact?: boolean }): string {
  if (options?.compact) {
    return trace.map(e =>
      `[${e.step}] ${e.controlTag}:${e.controlDetail} | stack=${e.stackDepth}${e.syscall ? ` | SYSCALL=${e.syscall}` : ""}`
    ).join("\n");
  }

  const lines: string[] = [];
  for (const e of trace) {
    lines.push(`Step ${e.step}:`);
    lines.push(`  Control: ${e.controlTag} - ${e.controlDetail}`);
    lines.push(`  Stack depth: ${e.stackDepth}`);
    if (e.stackTags.length > 0) {
      lines.push(`  Stack frames: [${e.stackTags.join(" <- ")}]`);
    }
    if (e.syscall) {
      lines.push(`  >>> SYSCALL: ${e.syscall}`);
    }
    lines.push("");
  }
  return lines.join("\n");
}
