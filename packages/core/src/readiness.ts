// Bounded readiness wait.
//
// Socket callbacks only record that something is ready; work happens when the
// owner of the endpoint runs a cycle. Readiness lets that cycle sleep until
// either something is ready or its time budget is spent, whichever is first.

/** Edge-triggered readiness signal with a timed wait. */
export class Readiness {
  private signalled = false;
  private waitingResolve: ((ready: boolean) => void) | null = null;

  /** Mark the owner as ready, waking a pending wait. */
  notify(): void {
    if (this.waitingResolve) {
      this.waitingResolve(true);
      this.waitingResolve = null;
    } else {
      this.signalled = true;
    }
  }

  /** Forget a signal that has already been acted upon. */
  reset(): void {
    this.signalled = false;
  }

  /**
   * Wait up to `timeoutMs` for a signal.
   *
   * Resolves `true` immediately if a signal is pending, `true` when one
   * arrives within the timeout, `false` once the timeout expires. Only one
   * wait may be pending at a time.
   */
  wait(timeoutMs: number): Promise<boolean> {
    if (this.signalled) {
      this.signalled = false;
      return Promise.resolve(true);
    }
    if (this.waitingResolve) {
      return Promise.reject(new Error("readiness wait already pending"));
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.waitingResolve = null;
        resolve(false);
      }, Math.max(0, timeoutMs));

      this.waitingResolve = (ready) => {
        clearTimeout(timer);
        resolve(ready);
      };
    });
  }
}

/** Validate a cycle budget in milliseconds. */
export function checkBudget(budgetMs: number): number {
  if (!Number.isFinite(budgetMs) || budgetMs < 0) {
    throw new RangeError(`cycle budget must be a non-negative number of milliseconds, got ${budgetMs}`);
  }
  return budgetMs;
}
