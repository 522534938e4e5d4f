type RateLimitedTask<T> = () => Promise<T> | T;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Spaces task starts at least `1000 / limitPerSecond` ms apart. Tasks run
 * concurrently once started; only the start slot is queued.
 */
export function createRateLimiter(limitPerSecond: number, now: () => number = Date.now) {
  const minDelay = Math.ceil(1000 / Math.max(1, limitPerSecond));
  let nextSlot = 0;

  const schedule = async <T>(task: RateLimitedTask<T>): Promise<T> => {
    const current = now();
    const slot = Math.max(current, nextSlot);
    nextSlot = slot + minDelay;

    const waitTime = slot - current;
    if (waitTime > 0) {
      await sleep(waitTime);
    }

    return task();
  };

  return { schedule };
}

export type RateLimiter = ReturnType<typeof createRateLimiter>;
