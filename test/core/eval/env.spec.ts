// test/core/eval/env.spec.ts
import { describe, it, expect } from "vitest";
import { envBindings, envEmpty, envExtend, envGet, envHas } from "../../../src/core/eval/env";
import * as agentlisp from "../../../src/index";

describe("environments", () => {
  it("looks up through parent layers", () => {
    const outer = envExtend(envEmpty(), [["a", 1]]);
    const inner = envExtend(outer, [["b", "two"]]);
    expect(envGet(inner, "a")).toBe(1);
    expect(envGet(inner, "b")).toBe("two");
    expect(envGet(inner, "c")).toBeUndefined();
    expect(envHas(inner, "a")).toBe(true);
    expect(envHas(outer, "b")).toBe(false);
  });

  it("shadows outer bindings without touching them", () => {
    const outer = envExtend(envEmpty(), [["x", "outer"]]);
    const inner = envExtend(outer, [["x", "inner"]]);
    expect(envGet(inner, "x")).toBe("inner");
    expect(envGet(outer, "x")).toBe("outer");
  });

  it("finds bindings whose value is empty or zero", () => {
    const env = envExtend(envEmpty(), [["s", ""], ["n", 0]]);
    expect(envGet(env, "s")).toBe("");
    expect(envGet(env, "n")).toBe(0);
  });

  it("returns the same environment for an empty extension", () => {
    const env = envExtend(envEmpty(), [["a", 1]]);
    expect(envExtend(env, [])).toBe(env);
  });

  it("flattens with the innermost binding winning", () => {
    const env = envExtend(envExtend(envEmpty(), [["a", 1], ["b", 2]]), [["b", 3]]);
    expect([...envBindings(env)]).toEqual([["a", 1], ["b", 3]]);
  });

  it("is reachable from the package entry point", () => {
    const env = agentlisp.envExtend(agentlisp.envEmpty(), [["k", "v"]]);
    expect(agentlisp.envHas(env, "k")).toBe(true);
    expect(agentlisp.envGet(env, "k")).toBe("v");
    expect([...agentlisp.envBindings(env)]).toEqual([["k", "v"]]);
  });
});
