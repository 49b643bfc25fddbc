// src/core/pipeline/lower.ts
// Datum -> Expr / FunctionDef. Every special and primitive form is
// arity-checked here so the machine can trust the shapes it receives.

import type { Datum, DList, Sym } from "../reader/datum";
import { isList, isSym, describeDatum } from "../reader/datum";
import type { Expr, FunctionDef, LetBinding } from "../ast";
import { KEYWORDS, PRIM_ARITY, isPrimOp } from "../ast";
import { syntaxError } from "../errors";

function expectIdent(d: Datum, what: string): Sym {
  if (!isSym(d)) throw syntaxError("E0001", { detail: `${what} must be an identifier, got ${describeDatum(d)}` }, d.span);
  if (KEYWORDS.has(d.name)) throw syntaxError("E0004", { name: d.name }, d.span);
  return d;
}

function expectList(d: Datum, what: string): DList {
  if (!isList(d)) throw syntaxError("E0001", { detail: `${what} must be a list, got ${describeDatum(d)}` }, d.span);
  return d;
}

function expectCount(form: string, d: DList, expected: number): void {
  const actual = d.items.length - 1;
  if (actual !== expected) throw syntaxError("E0005", { form, expected, actual }, d.span);
}

function lowerBinding(d: Datum): LetBinding {
  const pair = expectList(d, "let binding");
  if (pair.items.length !== 2) {
    throw syntaxError("E0001", { detail: `let binding must be (name expr), got ${describeDatum(d)}` }, d.span);
  }
  const id = expectIdent(pair.items[0], "let binder");
  return { name: id.name, init: lowerExpr(pair.items[1]) };
}

export function lowerExpr(d: Datum): Expr {
  switch (d.tag) {
    case "Int":
      return { tag: "Lit", value: d.n };
    case "Str":
      return { tag: "Lit", value: d.s };
    case "Sym":
      return { tag: "Var", name: expectIdent(d, "variable").name };
    case "List":
      break;
  }

  const items = d.items;
  if (items.length === 0) throw syntaxError("E0001", { detail: "empty form ()" }, d.span);

  const h = items[0];
  if (!isSym(h)) {
    throw syntaxError("E0001", { detail: `form head must be a name, got ${describeDatum(h)}` }, h.span);
  }

  switch (h.name) {
    case "if": {
      expectCount("if", d, 3);
      return {
        tag: "If",
        test: lowerExpr(items[1]),
        conseq: lowerExpr(items[2]),
        alt: lowerExpr(items[3]),
      };
    }

    case "let": {
      expectCount("let", d, 2);
      const bindsList = expectList(items[1], "let bindings");
      if (bindsList.items.length === 0) {
        throw syntaxError("E0001", { detail: "let needs at least one binding" }, bindsList.span);
      }
      const bindings: LetBinding[] = [];
      for (const b of bindsList.items) {
        const lowered = lowerBinding(b);
        if (bindings.some(x => x.name === lowered.name)) {
          throw syntaxError("E0014", { name: lowered.name }, b.span);
        }
        bindings.push(lowered);
      }
      return { tag: "Let", bindings, body: lowerExpr(items[2]) };
    }

    case "defun":
      throw syntaxError("E0001", { detail: "defun is only allowed at top level" }, h.span);
  }

  if (isPrimOp(h.name)) {
    expectCount(h.name, d, PRIM_ARITY[h.name]);
    return { tag: "Prim", op: h.name, args: items.slice(1).map(lowerExpr) };
  }

  return { tag: "Call", fn: h.name, args: items.slice(1).map(lowerExpr) };
}

export function lowerDefinition(d: Datum): FunctionDef {
  const form = expectList(d, "top-level form");
  const head = form.items[0];
  if (!head || !isSym(head) || head.name !== "defun") {
    throw syntaxError("E0001", { detail: `expected (defun name (params) body), got ${describeDatum(d)}` }, d.span);
  }
  expectCount("defun", form, 3);

  const name = expectIdent(form.items[1], "function name").name;
  const paramsList = expectList(form.items[2], "parameter list");

  const params: string[] = [];
  for (const p of paramsList.items) {
    const id = expectIdent(p, "parameter");
    if (params.includes(id.name)) throw syntaxError("E0013", { name: id.name, fn: name }, p.span);
    params.push(id.name);
  }

  return { name, params, body: lowerExpr(form.items[3]) };
}
