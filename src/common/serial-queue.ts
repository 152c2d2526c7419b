export interface SerialQueue {
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Runs tasks one at a time in submission order. Each load-modify-save cycle
 * over a repository goes through one of these so concurrent requests in the
 * same process cannot overwrite each other's writes.
 */
export function createSerialQueue(): SerialQueue {
  let tail: Promise<unknown> = Promise.resolve();
  return {
    run(task) {
      const result = tail.then(task);
      // The caller observes failures through `result`; the chain only needs to settle.
      tail = result.then(
        () => undefined,
        () => undefined,
      );
      return result;
    },
  };
}
