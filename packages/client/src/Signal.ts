/**
 * @fileoverview One-shot notification.
 */

/**
 * Consumer view of a signal: it can be awaited but not fired.
 */
export interface ReadonlySignal {
  /** Whether the signal has fired */
  readonly fired: boolean;

  /** Resolves once the signal fires (immediately if it already has). */
  wait(): Promise<void>;

  /**
   * Wait at most `timeoutMs` for the signal.
   * @returns true if the signal fired, false on timeout
   */
  waitFor(timeoutMs: number): Promise<boolean>;
}

/**
 * A signal that moves from pending to fired exactly once.
 * Firing an already fired signal is a no-op.
 */
export class Signal implements ReadonlySignal {
  private state: 'pending' | 'fired' = 'pending';
  private readonly promise: Promise<void>;
  private readonly resolve: () => void;

  constructor() {
    let resolve: () => void = () => undefined;
    this.promise = new Promise<void>((res) => {
      resolve = res;
    });
    this.resolve = resolve;
  }

  get fired(): boolean {
    return this.state === 'fired';
  }

  /**
   * Fire the signal.
   * @returns true if this call fired it, false if it had already fired
   */
  fire(): boolean {
    if (this.state === 'fired') {
      return false;
    }
    this.state = 'fired';
    this.resolve();
    return true;
  }

  wait(): Promise<void> {
    return this.promise;
  }

  async waitFor(timeoutMs: number): Promise<boolean> {
    return (await waitForAny([this], timeoutMs)) !== null;
  }
}

/**
 * Wait until one of `signals` fires or `timeoutMs` elapses.
 * @returns the first signal observed as fired, or null on timeout
 */
export async function waitForAny<T extends ReadonlySignal>(
  signals: readonly T[],
  timeoutMs: number
): Promise<T | null> {
  const alreadyFired = signals.find((signal) => signal.fired);
  if (alreadyFired) {
    return alreadyFired;
  }

  const timeout = createTimeout(timeoutMs);
  try {
    return await Promise.race([
      ...signals.map((signal) => signal.wait().then(() => signal)),
      timeout.expired,
    ]);
  } finally {
    timeout.cancel();
  }
}

/**
 * A promise that resolves with null after `timeoutMs`, unless cancelled first.
 */
export function createTimeout(timeoutMs: number): { expired: Promise<null>; cancel: () => void } {
  let handle: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<null>((resolve) => {
    handle = setTimeout(() => resolve(null), timeoutMs);
  });
  return { expired, cancel: () => clearTimeout(handle) };
}
