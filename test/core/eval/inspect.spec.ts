// test/core/eval/inspect.spec.ts
import { describe, it, expect } from "vitest";
import { describeOutcome, describeSysCall, inspectOutcome, inspectState, pendingSysCall } from "../../../src/core/eval/inspect";
import { initialState, step } from "../../../src/core/eval/machineStep";
import { runSteps } from "../../../src/core/eval/run";
import { parseProgram } from "../../../src/core/pipeline/compileText";
import { resumeValue, syscallPayload } from "../../../src/core/effects/syscall";

describe("describeSysCall", () => {
  it("describes each kind of call", () => {
    expect(describeSysCall({ tag: "Read" })).toBe("Waiting for user input");
    expect(describeSysCall({ tag: "Write", text: "Hello" })).toBe('Writing to output: "Hello"');
    expect(describeSysCall({ tag: "Tell", text: "fyi" })).toBe('Adding to conversation: "fyi"');
    expect(describeSysCall({ tag: "Ask", question: "why?" })).toBe('Asking agent: "why?"');
  });
});

describe("syscall helpers", () => {
  it("resumes read and ask with the input and write and tell with the empty string", () => {
    expect(resumeValue({ tag: "Read" }, "in")).toBe("in");
    expect(resumeValue({ tag: "Ask", question: "q" }, "in")).toBe("in");
    expect(resumeValue({ tag: "Write", text: "t" }, "in")).toBe("");
    expect(resumeValue({ tag: "Tell", text: "t" }, "in")).toBe("");
  });

  it("exposes the payload text", () => {
    expect(syscallPayload({ tag: "Read" })).toBeUndefined();
    expect(syscallPayload({ tag: "Write", text: "w" })).toBe("w");
    expect(syscallPayload({ tag: "Ask", question: "q" })).toBe("q");
  });
});

describe("inspecting outcomes", () => {
  it("reports a computing state", () => {
    const p = parseProgram('(defun main () (write "x"))');
    const out = step(p, initialState(p));
    expect(inspectOutcome(out)).toEqual({ kind: "computing" });
    expect(pendingSysCall(out)).toBeUndefined();
    expect(describeOutcome(out)).toBe("Computing");
  });

  it("reports a pending system call", () => {
    const p = parseProgram('(defun main () (let ((g "Hello")) (write g)))');
    const { outcome } = runSteps(p, initialState(p), 10);
    expect(pendingSysCall(outcome)).toEqual({ tag: "Write", text: "Hello" });
    expect(describeOutcome(outcome)).toBe('Writing to output: "Hello"');
    if (outcome.tag !== "State") return;
    expect(inspectState(outcome.state)).toEqual({ kind: "interop", syscall: { tag: "Write", text: "Hello" } });
  });

  it("reports completion", () => {
    expect(inspectOutcome({ tag: "Done", value: "" })).toEqual({ kind: "done", value: "" });
    expect(describeOutcome({ tag: "Done", value: "" })).toBe('Program completed with result: ""');
    expect(describeOutcome({ tag: "Done", value: 3 })).toBe("Program completed with result: 3");
  });

  it("reports failure", () => {
    const p = parseProgram("(defun main () missing)");
    const out = step(p, initialState(p));
    expect(inspectOutcome(out).kind).toBe("error");
    expect(describeOutcome(out)).toBe("Program failed: Undefined variable: missing");
  });
});
