// src/core/eval/machineStep.ts
// One transition of the machine. Pure: the program, the incoming state and
// every environment are left untouched, so any earlier state can be replayed.

import type { Expr, FunctionDef, Program } from "../ast";
import { PRIM_ARITY, isPrimOp } from "../ast";
import type { Computing, Control, Frame, Interop, State, StepOutcome } from "./machine";
import type { Env } from "./env";
import { envEmpty, envExtend, envGet } from "./env";
import type { Val } from "./values";
import { VEmpty, isTruthy, valueToString } from "./values";
import type { SysCall } from "../effects/syscall";
import { resumeValue } from "../effects/syscall";
import type { EvalPolicy } from "../config/config";
import { DEFAULT_POLICY } from "../config/config";
import { EvaluationError, evaluationError } from "../errors";
import { validateProgram } from "../pipeline/compileText";

export type StepOptions = {
  policy?: EvalPolicy;
};

function push(kont: readonly Frame[], fr: Frame): Frame[] {
  const k2 = kont.slice();
  k2.push(fr);
  return k2;
}

function pop(kont: readonly Frame[]): [Frame | undefined, readonly Frame[]] {
  if (kont.length === 0) return [undefined, kont];
  const k2 = kont.slice();
  const fr = k2.pop();
  return [fr, k2];
}

const expr = (e: Expr): Control => ({ tag: "Expr", e });
const val = (v: Val): Control => ({ tag: "Val", v });

function computing(control: Control, env: Env, kont: readonly Frame[]): Computing {
  return { tag: "Computing", control, env, kont };
}

function suspend(syscall: SysCall, env: Env, kont: readonly Frame[]): Interop {
  return { tag: "Interop", syscall, continuation: computing(val(VEmpty), env, kont) };
}

/** Computing state for `main()` in an empty environment. */
export function initialState(program: Program): Computing {
  const main = validateProgram(program);
  return computing(expr(main.body), envEmpty(), []);
}

/** Resolve a call target once its arguments are reduced. */
function lookupFunction(program: Program, name: string, argc: number): FunctionDef {
  if (isPrimOp(name)) throw evaluationError("E0104", { name });
  const fn = program.functions.get(name);
  if (!fn) throw evaluationError("E0103", { name });
  if (fn.params.length !== argc) {
    throw evaluationError("E0102", { name, expected: fn.params.length, actual: argc });
  }
  return fn;
}

/** The callee sees only its own parameters, never the caller's bindings. */
function enterCall(fn: FunctionDef, args: Val[], callerEnv: Env, kont: readonly Frame[]): Computing {
  const calleeEnv = envExtend(envEmpty(), fn.params.map((p, i): [string, Val] => [p, args[i]]));
  return computing(expr(fn.body), calleeEnv, push(kont, { tag: "KCall", fn: fn.name, savedEnv: callerEnv }));
}

/**
 * Hand a value to the continuation. KCall frames only restore the caller's
 * environment, so they are unwound in the same transition.
 */
function applyKont(program: Program, v: Val, env: Env, kont: readonly Frame[], policy: EvalPolicy): StepOutcome {
  let curEnv = env;
  let k = kont;

  while (true) {
    const [fr, k2] = pop(k);
    if (!fr) return { tag: "Done", value: v };

    switch (fr.tag) {
      case "KCall":
        curEnv = fr.savedEnv;
        k = k2;
        continue;

      case "KIf": {
        const branch = isTruthy(v, policy.truthiness) ? fr.conseq : fr.alt;
        return { tag: "State", state: computing(expr(branch), fr.env, k2) };
      }

      case "KLet": {
        const bound: Array<[string, Val]> = [...fr.bound, [fr.name, v]];
        if (fr.rest.length === 0) {
          return { tag: "State", state: computing(expr(fr.body), envExtend(fr.env, bound), k2) };
        }
        const [next, ...rest] = fr.rest;
        const initEnv = policy.letScoping === "sequential" ? envExtend(fr.env, bound) : fr.env;
        const frame: Frame = { tag: "KLet", name: next.name, rest, bound, body: fr.body, env: fr.env };
        return { tag: "State", state: computing(expr(next.init), initEnv, push(k2, frame)) };
      }

      case "KCallArg": {
        const acc = [...fr.acc, v];
        if (fr.pending.length === 0) {
          const fn = lookupFunction(program, fr.fn, acc.length);
          return { tag: "State", state: enterCall(fn, acc, fr.env, k2) };
        }
        const [next, ...pending] = fr.pending;
        const frame: Frame = { tag: "KCallArg", fn: fr.fn, pending, acc, env: fr.env };
        return { tag: "State", state: computing(expr(next), fr.env, push(k2, frame)) };
      }

      case "KPrim": {
        const text = valueToString(v);
        const syscall: SysCall =
          fr.op === "ask" ? { tag: "Ask", question: text }
          : fr.op === "tell" ? { tag: "Tell", text }
          : { tag: "Write", text };
        return { tag: "State", state: suspend(syscall, curEnv, k2) };
      }
    }
  }
}

function stepExpr(program: Program, e: Expr, env: Env, kont: readonly Frame[], policy: EvalPolicy): StepOutcome {
  switch (e.tag) {
    case "Lit":
      return applyKont(program, e.value, env, kont, policy);

    case "Var": {
      const v = envGet(env, e.name);
      if (v === undefined) throw evaluationError("E0101", { name: e.name });
      return applyKont(program, v, env, kont, policy);
    }

    case "If":
      return {
        tag: "State",
        state: computing(expr(e.test), env, push(kont, { tag: "KIf", conseq: e.conseq, alt: e.alt, env })),
      };

    case "Let": {
      if (e.bindings.length === 0) return { tag: "State", state: computing(expr(e.body), env, kont) };
      const [first, ...rest] = e.bindings;
      const frame: Frame = { tag: "KLet", name: first.name, rest, bound: [], body: e.body, env };
      return { tag: "State", state: computing(expr(first.init), env, push(kont, frame)) };
    }

    case "Call": {
      if (e.args.length === 0) {
        return { tag: "State", state: enterCall(lookupFunction(program, e.fn, 0), [], env, kont) };
      }
      const [first, ...pending] = e.args;
      const frame: Frame = { tag: "KCallArg", fn: e.fn, pending, acc: [], env };
      return { tag: "State", state: computing(expr(first), env, push(kont, frame)) };
    }

    case "Prim": {
      const expected = PRIM_ARITY[e.op];
      if (e.args.length !== expected) {
        throw evaluationError("E0105", { name: e.op, expected, actual: e.args.length });
      }
      if (e.op === "read") return { tag: "State", state: suspend({ tag: "Read" }, env, kont) };
      return { tag: "State", state: computing(expr(e.args[0]), env, push(kont, { tag: "KPrim", op: e.op })) };
    }
  }
}

/** Plug the driver's result into a suspended computation. */
export function resume(state: Interop, input: string): Computing {
  return { ...state.continuation, control: val(resumeValue(state.syscall, input)) };
}

/**
 * Advance by one transition.
 *
 * An Interop state needs `input`; without it the same state comes back
 * (blocked). For a Computing state `input` is ignored. Evaluation errors are
 * returned as an `Error` outcome rather than thrown.
 */
export function step(program: Program, state: State, input?: string, options: StepOptions = {}): StepOutcome {
  if (state.tag === "Interop") {
    if (input === undefined) return { tag: "State", state };
    return { tag: "State", state: resume(state, input) };
  }

  const policy = options.policy ?? DEFAULT_POLICY;
  try {
    const c = state.control;
    if (c.tag === "Val") return applyKont(program, c.v, state.env, state.kont, policy);
    return stepExpr(program, c.e, state.env, state.kont, policy);
  } catch (e) {
    if (e instanceof EvaluationError) return { tag: "Error", error: e, state };
    throw e;
  }
}
