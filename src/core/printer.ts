// src/core/printer.ts
// AST -> surface syntax. Output re-reads to an equal tree.

import type { Expr, FunctionDef, Program } from "./ast";
import type { Val } from "./eval/values";

function quote(s: string): string {
  let out = "\"";
  for (const c of s) {
    if (c === "\"" || c === "\\") out += "\\" + c;
    else if (c === "\n") out += "\\n";
    else if (c === "\t") out += "\\t";
    else out += c;
  }
  return out + "\"";
}

/** Strings quoted, integers bare. */
export function showVal(v: Val): string {
  return typeof v === "number" ? String(v) : quote(v);
}

export function exprToSource(e: Expr): string {
  switch (e.tag) {
    case "Lit":
      return showVal(e.value);
    case "Var":
      return e.name;
    case "If":
      return `(if ${exprToSource(e.test)} ${exprToSource(e.conseq)} ${exprToSource(e.alt)})`;
    case "Let": {
      const binds = e.bindings.map(b => `(${b.name} ${exprToSource(b.init)})`).join(" ");
      return `(let (${binds}) ${exprToSource(e.body)})`;
    }
    case "Call":
    case "Prim": {
      const head = e.tag === "Call" ? e.fn : e.op;
      return e.args.length === 0 ? `(${head})` : `(${head} ${e.args.map(exprToSource).join(" ")})`;
    }
  }
}

export function definitionToSource(def: FunctionDef): string {
  return `(defun ${def.name} (${def.params.join(" ")}) ${exprToSource(def.body)})`;
}

export function programToSource(program: Program): string {
  return Array.from(program.functions.values(), definitionToSource).join("\n");
}
