/**
 * Per-user turn queue
 *
 * Turns for the same user run strictly in arrival order: each new turn is
 * chained behind the previous one before any await, so a second turn cannot
 * start assembling context until the first has finished persisting.
 * Turns for different users run concurrently, bounded by a shared semaphore.
 */

import { Semaphore } from './semaphore.js';
import { createChildLogger } from './logger.js';

const log = createChildLogger('TurnQueue');

interface UserQueueState {
  /** Tail of the user's chain */
  chain: Promise<void>;
  /** Turns queued or running */
  depth: number;
}

export class TurnQueue {
  private readonly queues = new Map<string, UserQueueState>();
  private readonly semaphore: Semaphore;

  constructor(maxConcurrent: number) {
    this.semaphore = new Semaphore(maxConcurrent);
  }

  /**
   * Queue a task behind every earlier task for the same user.
   *
   * The returned promise settles with the task's own outcome; a failed task
   * does not break the chain for later ones.
   */
  enqueue<T>(userId: string, task: () => Promise<T>): Promise<T> {
    const existing = this.queues.get(userId);
    const previous = existing?.chain ?? Promise.resolve();
    const depth = (existing?.depth ?? 0) + 1;

    if (existing) {
      log.debug({ userId, queueDepth: depth }, 'turn queued behind an earlier turn');
    }

    const result = previous.then(() => this.semaphore.run(task));

    const tail = result
      .then(
        () => undefined,
        () => undefined,
      )
      .finally(() => {
        const state = this.queues.get(userId);
        if (!state) return;
        state.depth--;
        if (state.depth === 0) {
          this.queues.delete(userId);
        }
      });

    // Registered synchronously so the next enqueue for this user sees it
    this.queues.set(userId, { chain: tail, depth });

    return result;
  }

  /** Users with queued or running turns */
  get activeUsers(): number {
    return this.queues.size;
  }

  /** Wait for every queued turn to settle */
  async drain(): Promise<void> {
    await Promise.allSettled(Array.from(this.queues.values()).map((s) => s.chain));
  }
}
