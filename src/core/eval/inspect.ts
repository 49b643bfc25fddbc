// src/core/eval/inspect.ts
// Read-only views of states and outcomes for drivers and traces.

import type { State, StateView, StepOutcome } from "./machine";
import type { SysCall } from "../effects/syscall";
import { showVal } from "../printer";

export function inspectState(state: State): StateView {
  return state.tag === "Interop" ? { kind: "interop", syscall: state.syscall } : { kind: "computing" };
}

export function inspectOutcome(out: StepOutcome): StateView {
  switch (out.tag) {
    case "State":
      return inspectState(out.state);
    case "Done":
      return { kind: "done", value: out.value };
    case "Error":
      return { kind: "error", error: out.error };
  }
}

/** The pending call, if the outcome is waiting on the driver. */
export function pendingSysCall(out: StepOutcome): SysCall | undefined {
  return out.tag === "State" && out.state.tag === "Interop" ? out.state.syscall : undefined;
}

export function describeSysCall(call: SysCall): string {
  switch (call.tag) {
    case "Read":
      return "Waiting for user input";
    case "Write":
      return `Writing to output: ${showVal(call.text)}`;
    case "Tell":
      return `Adding to conversation: ${showVal(call.text)}`;
    case "Ask":
      return `Asking agent: ${showVal(call.question)}`;
  }
}

export function describeView(view: StateView): string {
  switch (view.kind) {
    case "computing":
      return "Computing";
    case "interop":
      return describeSysCall(view.syscall);
    case "done":
      return `Program completed with result: ${showVal(view.value)}`;
    case "error":
      return `Program failed: ${view.error.diagnostic.message}`;
  }
}

export function describeOutcome(out: StepOutcome): string {
  return describeView(inspectOutcome(out));
}
