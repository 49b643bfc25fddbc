// src/core/pipeline/compileText.ts
// Source text -> Program. Reads every top-level form, lowers each to a
// function definition, and checks the program-level rules.

import { tokenize } from "../reader/tokenize";
import { readAll } from "../reader/parse";
import { lowerDefinition } from "./lower";
import type { FunctionDef, Program } from "../ast";
import { LispSyntaxError, syntaxError } from "../errors";
import type { Outcome } from "../../outcome/outcome";
import { done, syntaxFailure } from "../../outcome/constructors";

export type ParseOptions = {
  /** Reported in diagnostic spans. */
  file?: string;
};

/**
 * Load-time checks shared by the parser and `initialState`: every table key
 * names its own definition, and `main` must exist and take no parameters.
 */
export function validateProgram(program: Program): FunctionDef {
  for (const [key, def] of program.functions) {
    if (key !== def.name) throw syntaxError("E0015", { key, name: def.name });
  }
  const main = program.functions.get("main");
  if (!main) throw syntaxError("E0010");
  if (main.params.length !== 0) throw syntaxError("E0011", { actual: main.params.length });
  return main;
}

export function parseProgram(text: string, options: ParseOptions = {}): Program {
  const datums = readAll(tokenize(text, options.file));

  const functions = new Map<string, FunctionDef>();
  for (const d of datums) {
    const def = lowerDefinition(d);
    if (functions.has(def.name)) throw syntaxError("E0012", { name: def.name }, d.span);
    functions.set(def.name, def);
  }

  const program: Program = { functions };
  validateProgram(program);
  return program;
}

export function tryParseProgram(text: string, options: ParseOptions = {}): Outcome<Program> {
  try {
    return done(parseProgram(text, options));
  } catch (e) {
    if (e instanceof LispSyntaxError) return syntaxFailure(e.diagnostic);
    throw e;
  }
}
