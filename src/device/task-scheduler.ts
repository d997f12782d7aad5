/**
 * @fileoverview Millisecond clock for the device pass. Every task repeats on its own
 * interval; `advanceTo` runs the due ones on the caller's stack, earliest first.
 */

export type TaskCallback = (now: number) => void;

interface RepeatingTask {
  name: string;
  interval: number;
  dueAt: number;
  callback: TaskCallback;
}

export class TaskScheduler {
  private nowMs = 0;
  private readonly tasks: RepeatingTask[] = [];

  now(): number {
    return this.nowMs;
  }

  /**
   * Registers a repeating task. The first run is due one interval from now; an interval
   * of 0 runs on every {@link advanceTo}.
   */
  scheduleEvery(name: string, interval: number, callback: TaskCallback): void {
    const safeInterval = Math.max(0, interval);
    this.tasks.push({ name, interval: safeInterval, dueAt: this.nowMs + safeInterval, callback });
  }

  /**
   * Moves the clock to `now` (never backwards) and runs every due task once, by due time
   * and then registration order. A task that fell more than one interval behind is
   * rescheduled from `now`; missed runs are not replayed.
   * @returns names of the tasks that ran, in run order
   */
  advanceTo(now: number): string[] {
    this.nowMs = Math.max(this.nowMs, now);
    const due = this.tasks
      .filter((task) => task.dueAt <= this.nowMs)
      .sort((a, b) => a.dueAt - b.dueAt);

    for (const task of due) {
      task.callback(this.nowMs);
      const next = task.dueAt + task.interval;
      task.dueAt = task.interval === 0 || next <= this.nowMs ? this.nowMs + task.interval : next;
    }
    return due.map((task) => task.name);
  }
}
