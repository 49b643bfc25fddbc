// src/core/eval/machine.ts
// Machine states. A Computing state is a CEK triple (control, environment,
// continuation stack); an Interop state is a pending system call paired with
// the Computing state that resumes once the driver supplies its result.

import type { Expr, LetBinding } from "../ast";
import type { Env } from "./env";
import type { Val } from "./values";
import type { SysCall } from "../effects/syscall";
import type { EvaluationError } from "../errors";

export type Control =
  | { tag: "Expr"; e: Expr }
  | { tag: "Val"; v: Val };

export type Frame =
  | { tag: "KIf"; conseq: Expr; alt: Expr; env: Env }
  | { tag: "KLet"; name: string; rest: LetBinding[]; bound: Array<[string, Val]>; body: Expr; env: Env }
  | { tag: "KCallArg"; fn: string; pending: Expr[]; acc: Val[]; env: Env }
  | { tag: "KPrim"; op: "write" | "tell" | "ask" }
  | { tag: "KCall"; fn: string; savedEnv: Env };   // restore env after function body

export type Computing = {
  readonly tag: "Computing";
  readonly control: Control;
  readonly env: Env;
  /** bottom->top, push/pop at end */
  readonly kont: readonly Frame[];
};

export type Interop = {
  readonly tag: "Interop";
  readonly syscall: SysCall;
  /** Its control holds the placeholder the driver's result replaces. */
  readonly continuation: Computing;
};

export type State = Computing | Interop;

export type StepOutcome =
  | { tag: "State"; state: State }
  | { tag: "Done"; value: Val }
  | { tag: "Error"; error: EvaluationError; state: State };

/** Read-only view for drivers deciding what to do next. */
export type StateView =
  | { kind: "computing" }
  | { kind: "interop"; syscall: SysCall }
  | { kind: "done"; value: Val }
  | { kind: "error"; error: EvaluationError };
