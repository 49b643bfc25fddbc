// test/core/reader/tokenize.spec.ts
import { describe, it, expect } from "vitest";
import { tokenize, type Tok } from "../../../src/core/reader/tokenize";
import { LispSyntaxError } from "../../../src/core/errors";

function shape(toks: Tok[]): string[] {
  return toks.map(t => (t.tag === "Str" || t.tag === "Atom" ? `${t.tag}:${t.s}` : t.tag));
}

describe("tokenize", () => {
  it("splits parens, strings and atoms", () => {
    expect(shape(tokenize('(a "b c" 12)'))).toEqual([
      "LParen",
      "Atom:a",
      "Str:b c",
      "Atom:12",
      "RParen",
    ]);
  });

  it("treats parens and quotes as delimiters without whitespace", () => {
    expect(shape(tokenize('(f(g)"s"x)'))).toEqual([
      "LParen",
      "Atom:f",
      "LParen",
      "Atom:g",
      "RParen",
      "Str:s",
      "Atom:x",
      "RParen",
    ]);
  });

  it("tracks 1-based line and column spans", () => {
    const toks = tokenize("(foo\n  bar)");
    expect(toks[0].span).toEqual({ startLine: 1, startCol: 1, endLine: 1, endCol: 2 });
    expect(toks[1].span).toEqual({ startLine: 1, startCol: 2, endLine: 1, endCol: 5 });
    expect(toks[2].span).toEqual({ startLine: 2, startCol: 3, endLine: 2, endCol: 6 });
    expect(toks[3].span).toEqual({ startLine: 2, startCol: 6, endLine: 2, endCol: 7 });
  });

  it("records the file name on spans", () => {
    const [t] = tokenize("x", "prog.alisp");
    expect(t.span.file).toBe("prog.alisp");
  });

  it("decodes string escapes", () => {
    const [t] = tokenize('"a\\nb\\"c\\\\\\td"');
    expect(t).toMatchObject({ tag: "Str", s: 'a\nb"c\\\td' });
  });

  it("keeps delimiters inside strings", () => {
    expect(shape(tokenize('"(;)"'))).toEqual(["Str:(;)"]);
  });

  it("skips comments to end of line", () => {
    expect(shape(tokenize("; header\n(x) ; trailing"))).toEqual(["LParen", "Atom:x", "RParen"]);
  });

  it("ends an atom at a comment", () => {
    expect(shape(tokenize("abc;rest"))).toEqual(["Atom:abc"]);
  });

  it("returns no tokens for blank input", () => {
    expect(tokenize("  \n\t ")).toEqual([]);
  });

  it("rejects an unterminated string", () => {
    try {
      tokenize('(write "abc');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LispSyntaxError);
      if (!(e instanceof LispSyntaxError)) return;
      expect(e.code).toBe("E0003");
      expect(e.message).toBe("SyntaxError at 1:8: Unterminated string literal");
    }
  });

  it("rejects a string ending in a lone backslash", () => {
    expect(() => tokenize('"abc\\')).toThrow(LispSyntaxError);
  });
});
