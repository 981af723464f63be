export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  /** True once resolve() has been called */
  readonly settled: boolean;
}

/** A promise plus its resolver. Later resolve() calls are ignored. */
export function createDeferred<T>(): Deferred<T> {
  let settle!: (value: T) => void;
  let settled = false;
  const promise = new Promise<T>((r) => {
    settle = r;
  });
  return {
    promise,
    resolve(value: T) {
      if (settled) return;
      settled = true;
      settle(value);
    },
    get settled() {
      return settled;
    },
  };
}
