export interface ScheduledTask {
  /** No further runs start. A run already in progress completes. */
  cancel(): void;
}

export interface Scheduler {
  /** Run `action` right away, then every `periodMs`. `action` must not reject. */
  scheduleRepeating(action: () => Promise<void>, periodMs: number): ScheduledTask;
}

/**
 * Timer-based scheduler. The timers are unref'd so a running reporting task
 * never keeps the host process alive.
 */
export const intervalScheduler: Scheduler = {
  scheduleRepeating(action, periodMs) {
    let cancelled = false;
    const run = () => {
      if (!cancelled) {
        void action();
      }
    };

    const first = setTimeout(run, 0);
    const timer = setInterval(run, periodMs);
    first.unref();
    timer.unref();

    return {
      cancel() {
        cancelled = true;
        clearTimeout(first);
        clearInterval(timer);
      },
    };
  },
};
