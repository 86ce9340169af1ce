/**
 * Per-thread mutual exclusion held across a whole read-modify-write.
 * Tasks for the same thread run one at a time in arrival order.
 */
export interface ThreadLock {
  runExclusive<T>(threadId: string, task: () => Promise<T>): Promise<T>;
}
