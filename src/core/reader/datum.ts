// src/core/reader/datum.ts
// Reader output: S-expressions with source spans.

import type { Span } from "../span";

export type Datum =
  | { tag: "Int"; n: number; span: Span }
  | { tag: "Str"; s: string; span: Span }
  | { tag: "Sym"; name: string; span: Span }
  | { tag: "List"; items: Datum[]; span: Span };

export type Sym = Extract<Datum, { tag: "Sym" }>;
export type DList = Extract<Datum, { tag: "List" }>;

export const isSym = (d: Datum): d is Sym => d.tag === "Sym";
export const isList = (d: Datum): d is DList => d.tag === "List";

export function describeDatum(d: Datum): string {
  switch (d.tag) {
    case "Int": return String(d.n);
    case "Str": return JSON.stringify(d.s);
    case "Sym": return d.name;
    case "List": return `(${d.items.map(describeDatum).join(" ")})`;
  }
}
