/**
 * Runner Module - Service Layer
 *
 * The single cooperative task loop every application task runs on.
 * Node executes one task at a time; a task yields only at its own await
 * points, which is where other tasks get to run.
 *
 * Every timer application code relies on is armed here, so stopping the
 * runner abandons all pending work in one place.
 */
import { createLogger } from "../logger.js";
import type { Task } from "./schema.js";

const log = createLogger("runner");

type Signal = Readonly<{ promise: Promise<void>; resolve: () => void }>;

function createSignal(): Signal {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export class TaskRunner {
  private running = false;
  private backlog: Array<() => void> = [];
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly immediates = new Set<NodeJS.Immediate>();
  private stopped: Signal = createSignal();

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Timers and queued tasks not yet executed.
   */
  get pendingCount(): number {
    return this.timers.size + this.immediates.size + this.backlog.length;
  }

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start executing tasks. Work submitted before start is released in
   * submission order.
   */
  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    const backlog = this.backlog;
    this.backlog = [];

    log.debug({ queued: backlog.length }, "Runner started");
    for (const arm of backlog) {
      arm();
    }
  }

  /**
   * Stop the loop. Pending timers are cleared, so suspended tasks are never
   * resumed. The runner can be started again afterwards.
   */
  stop(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    for (const immediate of this.immediates) {
      clearImmediate(immediate);
    }

    const abandoned = this.pendingCount;
    this.timers.clear();
    this.immediates.clear();
    this.backlog = [];
    this.running = false;

    log.info({ abandoned }, "Runner stopped");

    const stopped = this.stopped;
    this.stopped = createSignal();
    stopped.resolve();
  }

  /**
   * Resolves when the runner is next stopped.
   */
  done(): Promise<void> {
    return this.stopped.promise;
  }

  // ===========================================================================
  // Submission
  // ===========================================================================

  /**
   * Run a task on the next loop iteration.
   */
  now(task: Task): void {
    this.submit(() => this.armImmediate(task));
  }

  /**
   * Run a task no earlier than `delaySeconds` from now.
   */
  after(delaySeconds: number, task: Task): void {
    this.submit(() => this.armTimer(delaySeconds, () => this.execute(task)));
  }

  /**
   * Run a task at an absolute time given in epoch seconds.
   */
  at(epochSeconds: number, task: Task): void {
    this.after(epochSeconds - Date.now() / 1000, task);
  }

  /**
   * Suspend the calling task for `seconds`. Never resolves if the runner
   * is stopped first.
   */
  sleep(seconds: number): Promise<void> {
    return new Promise<void>((resolve) => this.armTimer(seconds, resolve));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private submit(arm: () => void): void {
    if (this.running) {
      arm();
    } else {
      this.backlog.push(arm);
    }
  }

  private armImmediate(task: Task): void {
    const handle = setImmediate(() => {
      this.immediates.delete(handle);
      this.execute(task);
    });
    this.immediates.add(handle);
  }

  private armTimer(seconds: number, fire: () => void): void {
    const handle = setTimeout(
      () => {
        this.timers.delete(handle);
        fire();
      },
      Math.max(0, seconds * 1000),
    );
    this.timers.add(handle);
  }

  private execute(task: Task): void {
    Promise.resolve()
      .then(task)
      .catch((error: unknown) => {
        log.error({ error }, "Task failed");
      });
  }
}
