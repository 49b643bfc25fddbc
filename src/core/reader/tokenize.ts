// src/core/reader/tokenize.ts
// Character stream -> tokens. Parentheses delimit, whitespace separates,
// `;` comments run to end of line.

import type { Span } from "../span";
import { syntaxError } from "../errors";

export type Tok =
  | { tag: "LParen"; span: Span }
  | { tag: "RParen"; span: Span }
  | { tag: "Str"; s: string; span: Span }
  | { tag: "Atom"; s: string; span: Span };

const ESCAPES: Record<string, string> = { n: "\n", t: "\t" };

export function tokenize(src: string, file?: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;
  let line = 1;
  let col = 1;

  const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
  const isDelim = (c: string) => isWS(c) || c === "(" || c === ")" || c === "\"" || c === ";";

  const here = (): Span => ({ file, startLine: line, startCol: col });
  const advance = (): string => {
    const c = src[i++];
    if (c === "\n") { line++; col = 1; } else { col++; }
    return c;
  };
  const close = (start: Span): Span => ({ ...start, endLine: line, endCol: col });

  while (i < src.length) {
    const c = src[i];

    if (c === ";") {
      while (i < src.length && src[i] !== "\n") advance();
      continue;
    }

    if (isWS(c)) { advance(); continue; }

    if (c === "(") { const sp = here(); advance(); toks.push({ tag: "LParen", span: close(sp) }); continue; }
    if (c === ")") { const sp = here(); advance(); toks.push({ tag: "RParen", span: close(sp) }); continue; }

    if (c === "\"") {
      const sp = here();
      advance();
      let s = "";
      let terminated = false;
      while (i < src.length) {
        const d = advance();
        if (d === "\"") { terminated = true; break; }
        if (d === "\\") {
          if (i >= src.length) break;
          const e = advance();
          s += ESCAPES[e] ?? e;
          continue;
        }
        s += d;
      }
      if (!terminated) throw syntaxError("E0003", undefined, sp);
      toks.push({ tag: "Str", s, span: close(sp) });
      continue;
    }

    // atom: read until whitespace or delimiter
    const sp = here();
    let a = "";
    while (i < src.length && !isDelim(src[i])) a += advance();
    toks.push({ tag: "Atom", s: a, span: close(sp) });
  }

  return toks;
}
