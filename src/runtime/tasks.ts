/**
 * TaskRegistry: tracked fire-and-forget work (memory recording, consolidation, the outbound loop).
 * A tracked task's rejection is logged here, so callers can schedule without awaiting.
 */

import { logger } from "../logging";

export class TaskRegistry {
  private readonly tasks = new Map<Promise<unknown>, string>();

  /** Register a detached task. Returns the promise, settled and never rejecting. */
  track(label: string, task: Promise<unknown>): Promise<void> {
    const settled = task.then(
      () => undefined,
      (err: unknown) => {
        logger.error({ event: "BACKGROUND_TASK_FAILED", task: label, err: (err as Error).message }, "Background task failed");
      }
    );
    this.tasks.set(settled, label);
    void settled.finally(() => this.tasks.delete(settled));
    return settled;
  }

  get size(): number {
    return this.tasks.size;
  }

  labels(): string[] {
    return [...this.tasks.values()];
  }

  /**
   * Wait for every tracked task (including ones scheduled while draining) or until the timeout.
   * Returns the labels still running when it gave up.
   */
  async drain(timeoutMs: number): Promise<string[]> {
    const deadline = Date.now() + timeoutMs;
    while (this.tasks.size > 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, remaining);
      });
      await Promise.race([Promise.all([...this.tasks.keys()]), timeout]);
      clearTimeout(timer);
    }
    return this.labels();
  }
}
