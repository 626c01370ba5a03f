import { errorMessage } from '../lib/godaikin/errors';
import type { Logger } from '../lib/logger';

export interface PollTask {
  id: string;
  /** Milliseconds between the end of one run and the start of the next */
  interval: number;
  run: () => Promise<void> | void;
  immediate?: boolean;
}

export interface PollSchedulerOptions {
  logger?: Logger;
  jitter?: number;
}

interface ScheduledTask extends PollTask {
  timeout?: NodeJS.Timeout;
  lastRun?: number;
  inFlight?: Promise<void>;
}

/**
 * Drives the background work of the core: the `sync` poll and the mold-proof
 * tick each run on their own timer. The next run of a task is scheduled only
 * after the current one settles, so a slow cloud never stacks up cycles.
 */
export class PollScheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly logger?: Logger;
  private readonly jitter: number;
  private running = false;

  constructor(options: PollSchedulerOptions = {}) {
    this.logger = options.logger;
    this.jitter = options.jitter ?? 0;
  }

  register(task: PollTask): void {
    if (this.tasks.has(task.id)) {
      throw new Error(`Poll task with id "${task.id}" already registered`);
    }

    const state: ScheduledTask = { ...task };
    this.tasks.set(task.id, state);

    if (this.running) {
      this.schedule(state, task.immediate ?? true);
    }
  }

  updateInterval(id: string, interval: number): void {
    const task = this.requireTask(id);

    task.interval = interval;
    if (this.running && !task.inFlight) {
      this.clearTimeout(task);
      this.schedule(task, false);
    }
  }

  /**
   * Runs a task outside its cadence. A run already in progress is shared; the
   * next regular run is counted from this one.
   */
  async runNow(id: string): Promise<void> {
    const task = this.requireTask(id);
    if (task.inFlight) {
      return task.inFlight;
    }

    this.clearTimeout(task);
    await this.execute(task);
  }

  start(): void {
    if (this.running) {
      return;
    }

    this.running = true;
    for (const task of this.tasks.values()) {
      this.schedule(task, task.immediate ?? true);
    }
  }

  stop(): void {
    if (!this.running) {
      return;
    }

    this.running = false;
    for (const task of this.tasks.values()) {
      this.clearTimeout(task);
    }
  }

  unregister(id: string): void {
    const task = this.tasks.get(id);
    if (!task) {
      return;
    }

    this.clearTimeout(task);
    this.tasks.delete(id);
  }

  isRunning(): boolean {
    return this.running;
  }

  lastRun(id: string): number | undefined {
    return this.tasks.get(id)?.lastRun;
  }

  private schedule(task: ScheduledTask, immediate: boolean): void {
    if (!this.running) {
      return;
    }

    const delay = immediate ? 0 : this.calculateDelay(task.interval);
    task.timeout = setTimeout(() => {
      task.timeout = undefined;
      this.execute(task).catch((error: unknown) => {
        this.logger?.error('[PollScheduler] Scheduling "%s" failed: %s', task.id, errorMessage(error));
      });
    }, delay);
  }

  private async execute(task: ScheduledTask): Promise<void> {
    const run = this.invoke(task);
    task.inFlight = run;
    try {
      await run;
    } finally {
      task.inFlight = undefined;
      if (this.running && this.tasks.get(task.id) === task) {
        this.clearTimeout(task);
        this.schedule(task, false);
      }
    }
  }

  private async invoke(task: ScheduledTask): Promise<void> {
    try {
      task.lastRun = Date.now();
      await task.run();
    } catch (error) {
      this.logger?.error('[PollScheduler] Poll task "%s" failed: %s', task.id, errorMessage(error));
    }
  }

  private requireTask(id: string): ScheduledTask {
    const task = this.tasks.get(id);
    if (!task) {
      throw new Error(`Unknown poll task: ${id}`);
    }
    return task;
  }

  private calculateDelay(interval: number): number {
    if (this.jitter <= 0) {
      return interval;
    }

    const jitterValue = Math.floor(Math.random() * this.jitter);
    return interval + jitterValue;
  }

  private clearTimeout(task: ScheduledTask): void {
    if (task.timeout) {
      clearTimeout(task.timeout);
      task.timeout = undefined;
    }
  }
}

export default PollScheduler;
