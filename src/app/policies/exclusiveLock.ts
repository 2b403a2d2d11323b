import { logger } from '../../lib/logger';

/**
 * In-process mutual exclusion. Callers queue in arrival order; the lock is
 * released when the work settles, whether it resolved or threw.
 */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;
  private held = false;

  constructor(private readonly name: string) {}

  isHeld(): boolean {
    return this.held;
  }

  queueDepth(): number {
    return this.waiting;
  }

  async runExclusive<T>(work: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.tail = previous.then(() => current);

    this.waiting += 1;
    if (this.held) {
      logger.debug({ feature: 'lock', lock: this.name, waiting: this.waiting }, 'Waiting for exclusive lock');
    }

    await previous;
    this.waiting -= 1;
    this.held = true;

    try {
      return await work();
    } finally {
      this.held = false;
      release();
    }
  }
}
