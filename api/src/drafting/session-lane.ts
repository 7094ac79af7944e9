/**
 * Per-session lane: one turn at a time, the rest wait in FIFO order.
 * Lanes are independent, so different sessions never block each other.
 */
export class SessionLane {
  private active = 0;
  private readonly waitingQueue: Array<() => void> = [];

  constructor(private readonly maxConcurrent = 1) {}

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.active++;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.active--;
          this.next();
        });
      };

      if (this.active < this.maxConcurrent) {
        grant();
      } else {
        this.waitingQueue.push(grant);
      }
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private next() {
    if (this.waitingQueue.length > 0 && this.active < this.maxConcurrent) {
      const grant = this.waitingQueue.shift();
      if (grant) grant();
    }
  }
}
