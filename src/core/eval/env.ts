// src/core/eval/env.ts
// Persistent environments: a chain of frozen binding layers. Extending shares
// the parent chain; nothing is ever written in place.

import type { Val } from "./values";

export type Env = {
  readonly vars: ReadonlyMap<string, Val>;
  readonly parent?: Env;
};

const EMPTY: Env = { vars: new Map() };

export function envEmpty(): Env {
  return EMPTY;
}

export function envExtend(env: Env, binds: ReadonlyArray<readonly [string, Val]>): Env {
  if (binds.length === 0) return env;
  return { vars: new Map(binds), parent: env };
}

export function envGet(env: Env, name: string): Val | undefined {
  for (let cur: Env | undefined = env; cur; cur = cur.parent) {
    const hit = cur.vars.get(name);
    if (hit !== undefined) return hit;
  }
  return undefined;
}

export function envHas(env: Env, name: string): boolean {
  return envGet(env, name) !== undefined;
}

/** Flattened view, innermost binding wins. */
export function envBindings(env: Env): Map<string, Val> {
  const layers: Env[] = [];
  for (let cur: Env | undefined = env; cur; cur = cur.parent) layers.push(cur);

  const out = new Map<string, Val>();
  for (let i = layers.length - 1; i >= 0; i--) {
    for (const [k, val] of layers[i].vars) out.set(k, val);
  }
  return out;
}
