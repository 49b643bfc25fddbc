// test/core/pipeline/compileText.spec.ts
import { describe, it, expect } from "vitest";
import { parseProgram, tryParseProgram, validateProgram } from "../../../src/core/pipeline/compileText";
import { call, defun, ifE, letE, lit, prim, program, v } from "../../../src/core/ast";
import { LispSyntaxError } from "../../../src/core/errors";

function syntaxCode(src: string): string | undefined {
  try {
    parseProgram(src);
  } catch (e) {
    if (e instanceof LispSyntaxError) return e.code;
    throw e;
  }
  return undefined;
}

describe("parseProgram", () => {
  it("parses the hello-world program", () => {
    const p = parseProgram('(defun main () (let ((g "Hello")) (write g)))');
    expect(p).toEqual(program(defun("main", [], letE([["g", lit("Hello")]], prim("write", v("g"))))));
  });

  it("parses every expression form", () => {
    const src = `
      ; greet the user, then ask the agent about them
      (defun greet (name who)
        (if name (tell name) (ask who)))

      (defun main ()
        (let ((n (read)) (k 0))
          (greet n "nobody")))
    `;
    const p = parseProgram(src);
    expect(p).toEqual(
      program(
        defun("greet", ["name", "who"], ifE(v("name"), prim("tell", v("name")), prim("ask", v("who")))),
        defun("main", [], letE([["n", prim("read")], ["k", lit(0)]], call("greet", v("n"), lit("nobody"))))
      )
    );
  });

  it("keeps definition order", () => {
    const p = parseProgram("(defun b () 1) (defun main () 2) (defun a () 3)");
    expect([...p.functions.keys()]).toEqual(["b", "main", "a"]);
  });

  it("allows forward references between functions", () => {
    const p = parseProgram("(defun main () (later)) (defun later () 1)");
    expect(p.functions.get("main")?.body).toEqual(call("later"));
  });

  it("leaves unknown call targets to run time", () => {
    expect(syntaxCode("(defun main () (nowhere 1 2))")).toBeUndefined();
  });

  it("includes the location in the error message", () => {
    expect(() => parseProgram("(defun main ()\n  (if 1 2))", { file: "greet.alisp" })).toThrow(
      "SyntaxError at greet.alisp:2:3: Wrong number of sub-forms for if: expected 3, got 2"
    );
  });

  describe("rejects malformed programs", () => {
    const cases: Array<[string, string, string]> = [
      ["unbalanced open", "(defun main () 1", "E0002"],
      ["unbalanced close", "(defun main () 1))", "E0002"],
      ["unterminated string", '(defun main () "oops)', "E0003"],
      ["non-list top-level form", "42", "E0001"],
      ["top-level form other than defun", "(foo main () 1)", "E0001"],
      ["defun missing body", "(defun main ())", "E0005"],
      ["nested defun", "(defun main () (defun g () 1))", "E0001"],
      ["empty form", "(defun main () ())", "E0001"],
      ["non-name head", "(defun main () (1 2))", "E0001"],
      ["if with two sub-forms", "(defun main () (if 1 2))", "E0005"],
      ["if with four sub-forms", "(defun main () (if 1 2 3 4))", "E0005"],
      ["let without body", "(defun main () (let ((x 1))))", "E0005"],
      ["let with no bindings", "(defun main () (let () 1))", "E0001"],
      ["let binding without init", "(defun main () (let ((x)) 1))", "E0001"],
      ["let binding list that is a symbol", "(defun main () (let x 1))", "E0001"],
      ["duplicate let binder", "(defun main () (let ((x 1) (x 2)) x))", "E0014"],
      ["write without argument", "(defun main () (write))", "E0005"],
      ["read with an argument", "(defun main () (read 1))", "E0005"],
      ["ask with two arguments", '(defun main () (ask "a" "b"))', "E0005"],
      ["keyword as variable", "(defun main () if)", "E0004"],
      ["keyword as let binder", "(defun main () (let ((read 1)) 1))", "E0004"],
      ["primitive as function name", "(defun write () 1) (defun main () 1)", "E0004"],
      ["keyword as parameter", "(defun f (let) 1) (defun main () 1)", "E0004"],
      ["non-symbol parameter", "(defun f (1) 1) (defun main () 1)", "E0001"],
      ["duplicate parameter", "(defun f (a a) a) (defun main () 1)", "E0013"],
      ["missing main", "(defun f () 1)", "E0010"],
      ["empty program", "", "E0010"],
      ["main with parameters", "(defun main (x) x)", "E0011"],
      ["duplicate main", "(defun main () 1) (defun main () 2)", "E0012"],
      ["duplicate helper", "(defun f () 1) (defun f () 2) (defun main () 1)", "E0012"],
      ["integer out of range", "(defun main () 123456789012345678901)", "E0006"],
    ];

    it.each(cases)("%s", (_name, src, code) => {
      expect(syntaxCode(src)).toBe(code);
    });
  });
});

describe("tryParseProgram", () => {
  it("returns Done for a valid program", () => {
    const o = tryParseProgram("(defun main () 1)");
    expect(o.tag).toBe("Done");
    if (o.tag !== "Done") return;
    expect(o.value.functions.get("main")?.body).toEqual(lit(1));
  });

  it("returns a syntax-error Fail with the diagnostic", () => {
    const o = tryParseProgram("(defun main () x) (defun main () y)");
    expect(o.tag).toBe("Fail");
    if (o.tag !== "Fail") return;
    expect(o.failure.reason).toBe("syntax-error");
    expect(o.failure.message).toBe("Function main is defined more than once");
    expect(o.failure.diagnostics.map(d => d.code)).toEqual(["E0012"]);
    expect(o.meta.span).toEqual({ startLine: 1, startCol: 19, endLine: 1, endCol: 36 });
  });
});

describe("validateProgram", () => {
  it("returns main", () => {
    const main = defun("main", [], lit("x"));
    expect(validateProgram(program(main))).toBe(main);
  });

  it("rejects a hand-built program without main", () => {
    expect(() => validateProgram(program(defun("other", [], lit(1))))).toThrow("Program has no main function");
  });

  it("rejects a function table keyed under another name", () => {
    const functions = new Map([
      ["main", defun("main", [], call("alias"))],
      ["alias", defun("helper", [], lit(1))],
    ]);
    try {
      validateProgram({ functions });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(LispSyntaxError);
      if (!(e instanceof LispSyntaxError)) return;
      expect(e.code).toBe("E0015");
      expect(e.diagnostic.message).toBe("Function table key alias does not match definition name helper");
    }
  });

  it("rejects a hand-built main that takes parameters", () => {
    expect(() => validateProgram(program(defun("main", ["a"], v("a"))))).toThrow(
      "main must take no parameters, got 1"
    );
  });
});
