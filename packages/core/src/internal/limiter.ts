export type Limiter = {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly inFlight: number;
};

/** Caps how many tasks run at once; waiting tasks start in submission order. */
export function createLimiter(concurrency: number): Limiter {
  const limit = Math.max(1, Math.floor(concurrency));
  const slotWaiters: (() => void)[] = [];
  let inFlight = 0;

  async function acquireSlot(): Promise<void> {
    if (inFlight < limit) {
      inFlight += 1;
      return;
    }
    await new Promise<void>((resolve) => {
      slotWaiters.push(resolve);
    });
    inFlight += 1;
  }

  function releaseSlot() {
    inFlight = Math.max(0, inFlight - 1);
    const next = slotWaiters.shift();
    if (next) next();
  }

  return {
    async run(task) {
      await acquireSlot();
      try {
        return await task();
      } finally {
        releaseSlot();
      }
    },
    get inFlight() {
      return inFlight;
    },
  };
}
