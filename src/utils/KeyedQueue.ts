import PQueue from 'p-queue';

/**
 * One single-concurrency queue per key. Tasks for one key run in call order;
 * tasks for different keys run concurrently.
 */
export class KeyedQueue {
  private queues: Map<string, PQueue> = new Map();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(key);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(key, queue);
    }

    const idleQueue = queue;
    const forget = (): void => {
      if (idleQueue.size === 0 && idleQueue.pending === 0 && this.queues.get(key) === idleQueue) {
        this.queues.delete(key);
      }
    };
    const result = queue.add(task);
    result.then(forget, forget);
    return result;
  }
}
