import type { ThreadLock } from '../../application/ports/driven/thread-lock.port.js';
import { KeyedSerialQueue } from '../../infrastructure/utils/keyed-serial-queue.js';

/**
 * ThreadLock for a single process
 */
export class InProcessThreadLock implements ThreadLock {
  private queue = new KeyedSerialQueue();

  runExclusive<T>(threadId: string, task: () => Promise<T>): Promise<T> {
    return this.queue.run(threadId, task);
  }

  activeThreads(): number {
    return this.queue.pendingKeys();
  }
}
