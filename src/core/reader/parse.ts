// src/core/reader/parse.ts
// Tokens -> datums. Atoms that look like integers become Int, everything
// else becomes Sym; keyword handling is left to lowering.

import type { Tok } from "./tokenize";
import type { Datum } from "./datum";
import { spanCover } from "../span";
import { syntaxError } from "../errors";

const INT_RE = /^-?\d+$/;

export function readAll(toks: Tok[]): Datum[] {
  const out: Datum[] = [];
  let i = 0;

  function readOne(): Datum {
    const t = toks[i];

    if (t.tag === "LParen") {
      i++;
      const items: Datum[] = [];
      while (true) {
        const u = toks[i];
        if (!u) throw syntaxError("E0002", { detail: "missing ')'" }, t.span);
        if (u.tag === "RParen") {
          i++;
          return { tag: "List", items, span: spanCover(t.span, u.span) };
        }
        items.push(readOne());
      }
    }

    i++;

    switch (t.tag) {
      case "RParen":
        throw syntaxError("E0002", { detail: "unexpected ')'" }, t.span);

      case "Str":
        return { tag: "Str", s: t.s, span: t.span };

      case "Atom": {
        if (INT_RE.test(t.s)) {
          const n = Number(t.s);
          if (!Number.isSafeInteger(n)) throw syntaxError("E0006", { text: t.s }, t.span);
          return { tag: "Int", n, span: t.span };
        }
        return { tag: "Sym", name: t.s, span: t.span };
      }
    }
  }

  while (i < toks.length) {
    out.push(readOne());
  }
  return out;
}
