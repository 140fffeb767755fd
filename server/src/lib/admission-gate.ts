/**
 * Fixed-size permit pool for heavy requests. Callers beyond the pool size
 * wait in FIFO order until a permit is released.
 */

export interface AdmissionGateStats {
  permits: number;
  available: number;
  waiting: number;
}

export class AdmissionGate {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(private readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`AdmissionGate needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--;
      return this.createRelease();
    }

    await new Promise<void>(resolve => {
      this.waiters.push(resolve);
    });
    return this.createRelease();
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getStats(): AdmissionGateStats {
    return {
      permits: this.permits,
      available: this.available,
      waiting: this.waiters.length
    };
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      // Hand the permit straight to the next waiter
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.available++;
      }
    };
  }
}
