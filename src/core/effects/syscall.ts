// src/core/effects/syscall.ts
// Requests the machine hands to its driver. The machine never performs them.

import type { Val } from "../eval/values";
import { VEmpty } from "../eval/values";

export type SysCall =
  | { readonly tag: "Read" }
  | { readonly tag: "Write"; readonly text: string }
  | { readonly tag: "Tell"; readonly text: string }
  | { readonly tag: "Ask"; readonly question: string };

export type SysCallTag = SysCall["tag"];

/** Value the suspended expression reduces to once `input` is supplied. */
export function resumeValue(call: SysCall, input: string): Val {
  switch (call.tag) {
    case "Read":
    case "Ask":
      return input;
    case "Write":
    case "Tell":
      return VEmpty;
  }
}

export function syscallPayload(call: SysCall): string | undefined {
  switch (call.tag) {
    case "Read":
      return undefined;
    case "Write":
    case "Tell":
      return call.text;
    case "Ask":
      return call.question;
  }
}
