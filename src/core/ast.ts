// src/core/ast.ts
// Abstract syntax: expressions, function definitions, programs.

import type { Val } from "./eval/values";

export type PrimOp = "write" | "read" | "tell" | "ask";

/** Number of argument expressions each primitive form takes. */
export const PRIM_ARITY: Record<PrimOp, number> = {
  write: 1,
  read: 0,
  tell: 1,
  ask: 1,
};

export const PRIM_OPS: readonly PrimOp[] = ["write", "read", "tell", "ask"];

export const KEYWORDS: ReadonlySet<string> = new Set(["defun", "if", "let", ...PRIM_OPS]);

export function isPrimOp(name: string): name is PrimOp {
  return PRIM_OPS.some(op => op === name);
}

export type LetBinding = { name: string; init: Expr };

export type Expr =
  | { tag: "Lit"; value: Val }
  | { tag: "Var"; name: string }
  | { tag: "If"; test: Expr; conseq: Expr; alt: Expr }
  | { tag: "Let"; bindings: LetBinding[]; body: Expr }
  | { tag: "Call"; fn: string; args: Expr[] }
  | { tag: "Prim"; op: PrimOp; args: Expr[] };

export type FunctionDef = {
  name: string;
  params: string[];
  body: Expr;
};

/** Function table keyed by name, in definition order. */
export type Program = {
  functions: ReadonlyMap<string, FunctionDef>;
};

// Constructors, mostly for building trees by hand in tests and tools.

export const lit = (value: Val): Expr => ({ tag: "Lit", value });
export const v = (name: string): Expr => ({ tag: "Var", name });
export const ifE = (test: Expr, conseq: Expr, alt: Expr): Expr => ({ tag: "If", test, conseq, alt });
export const letE = (bindings: Array<[string, Expr]>, body: Expr): Expr => ({
  tag: "Let",
  bindings: bindings.map(([name, init]) => ({ name, init })),
  body,
});
export const call = (fn: string, ...args: Expr[]): Expr => ({ tag: "Call", fn, args });
export const prim = (op: PrimOp, ...args: Expr[]): Expr => ({ tag: "Prim", op, args });

export const defun = (name: string, params: string[], body: Expr): FunctionDef => ({ name, params, body });

export function program(...defs: FunctionDef[]): Program {
  return { functions: new Map(defs.map(d => [d.name, d])) };
}
