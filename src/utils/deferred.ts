// Deferred and delay helpers, kept out of the type barrel (src/types.ts)
// The audio arbiter waits on a deferred for TTS release

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Resolves after `ms` milliseconds. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
