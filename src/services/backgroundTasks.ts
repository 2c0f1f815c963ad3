import { logger } from "../config/logger.js";

/** Keeps track of fire-and-forget work so shutdown can wait for it. */
export class BackgroundTasks {
  private readonly pending = new Set<Promise<void>>();

  run(name: string, task: () => Promise<void>): void {
    const tracked: Promise<void> = Promise.resolve()
      .then(task)
      .catch((err: unknown) => {
        logger.error({
          action: "background_task_failed",
          task: name,
          error: err instanceof Error ? err.message : String(err),
        });
      })
      .finally(() => {
        this.pending.delete(tracked);
      });
    this.pending.add(tracked);
  }

  get size(): number {
    return this.pending.size;
  }

  /** Resolves once every task, including ones started while draining, has settled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}
