/** Produces the delay before each successive retry. */
export interface BackOff {
  nextDelayMs(): number;
}

/** Retry loops take a fresh BackOff per push so state is never shared. */
export type BackOffFactory = () => BackOff;

export class ConstantBackOff implements BackOff {
  constructor(private readonly intervalMs: number) {}

  nextDelayMs(): number {
    return this.intervalMs;
  }
}

export type ExponentialBackOffOptions = {
  initialIntervalMs: number;
  multiplier: number;
  maxIntervalMs: number;
  randomizationFactor: number;
  random: () => number;
};

const exponentialDefaults: ExponentialBackOffOptions = {
  initialIntervalMs: 500,
  multiplier: 1.5,
  maxIntervalMs: 60_000,
  randomizationFactor: 0.5,
  random: Math.random
};

export class ExponentialBackOff implements BackOff {
  private readonly options: ExponentialBackOffOptions;
  private currentMs: number;

  constructor(options: Partial<ExponentialBackOffOptions> = {}) {
    this.options = { ...exponentialDefaults, ...options };
    this.currentMs = this.options.initialIntervalMs;
  }

  nextDelayMs(): number {
    const { randomizationFactor, random, multiplier, maxIntervalMs } = this.options;
    const delta = randomizationFactor * this.currentMs;
    const min = this.currentMs - delta;
    const max = this.currentMs + delta;
    // uniform in [current - delta, current + delta]
    const delay = Math.round(min + random() * (max - min));
    this.currentMs = Math.min(this.currentMs * multiplier, maxIntervalMs);
    return delay;
  }
}

export function constantBackOff(intervalMs: number): BackOffFactory {
  return () => new ConstantBackOff(intervalMs);
}

export function exponentialBackOff(
  options: Partial<ExponentialBackOffOptions> = {}
): BackOffFactory {
  return () => new ExponentialBackOff(options);
}

/** Resolves true after ms, or false as soon as the signal aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
