// src/libs/executor.ts
// ============================================================================
// Worker-Pool für Hintergrund-Tasks (Mail-Versand, Account-Speichern)
// ----------------------------------------------------------------------------
// - begrenzte Parallelität, FIFO
// - Tasks mit gleichem `key` laufen strikt nacheinander (Submit-Reihenfolge)
// - Fehler werden geloggt, nie an den Aufrufer von submit() weitergereicht
// - drain() wartet beim Shutdown auf alle offenen Tasks; danach liefert
//   submit() false und der Task läuft nie
// ============================================================================

import type { Logger } from "./logger.js";

export interface BackgroundTask {
  /** Name fürs Logging, z. B. "mail_delivery" */
  name: string;
  /** Serialisierungs-Schlüssel, z. B. "account:<identity>" */
  key?: string;
  run(): Promise<void>;
}

export interface TaskExecutor {
  /** false: Task wurde nicht angenommen (Pool geschlossen) */
  submit(task: BackgroundTask): boolean;
  /** optional: beim Shutdown auf offene Tasks warten */
  drain?(): Promise<void>;
}

type Entry = {
  task: BackgroundTask;
  settled: () => void;
};

export class WorkerPoolExecutor implements TaskExecutor {
  private readonly queue: Entry[] = [];
  private readonly activeKeys = new Set<string>();
  private readonly idleWaiters: Array<() => void> = [];
  private running = 0;
  private closed = false;

  constructor(
    private readonly log: Logger,
    private readonly concurrency = 4,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get pending(): number {
    return this.queue.length + this.running;
  }

  submit(task: BackgroundTask): boolean {
    if (this.closed) {
      this.log.warn({ task: task.name }, "task_rejected_executor_closed");
      return false;
    }
    this.queue.push({ task, settled: () => this.onSettled(task) });
    this.pump();
    return true;
  }

  /**
   * Nimmt keine neuen Tasks mehr an und wartet, bis alles abgearbeitet ist.
   */
  async drain(): Promise<void> {
    this.closed = true;
    if (this.pending === 0) return;
    await new Promise<void>((resolve) => this.idleWaiters.push(resolve));
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      const index = this.queue.findIndex(
        (entry) => entry.task.key === undefined || !this.activeKeys.has(entry.task.key),
      );
      if (index === -1) return;

      const [entry] = this.queue.splice(index, 1);
      this.start(entry);
    }
  }

  private start(entry: Entry): void {
    const { task } = entry;
    this.running += 1;
    if (task.key !== undefined) this.activeKeys.add(task.key);

    void Promise.resolve()
      .then(() => task.run())
      .catch((err: unknown) => {
        this.log.error({ err, task: task.name }, "background_task_failed");
      })
      .finally(entry.settled);
  }

  private onSettled(task: BackgroundTask): void {
    this.running -= 1;
    if (task.key !== undefined) this.activeKeys.delete(task.key);
    this.pump();

    if (this.pending === 0) {
      for (const resolve of this.idleWaiters.splice(0)) resolve();
    }
  }
}
