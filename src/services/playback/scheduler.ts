/**
 * Cancellable timers for the playback engine.
 *
 * Every scheduled task returns a handle; `cancel()` is idempotent and, once it
 * returns, the callback is guaranteed not to run again. Callbacks that were
 * already dequeued by the event loop are filtered by the `active` flag.
 */

export interface ScheduledTask {
    cancel(): void;
    readonly active: boolean;
}

export interface Scheduler {
    /** Run `callback` once after `delayMs`. */
    once(delayMs: number, callback: () => void): ScheduledTask;
    /** Run `callback` every `intervalMs` until cancelled. */
    every(intervalMs: number, callback: () => void): ScheduledTask;
}

class TimerTask implements ScheduledTask {
    private handle: ReturnType<typeof setTimeout> | null = null;
    private cleared = false;

    constructor(private readonly clear: (handle: ReturnType<typeof setTimeout>) => void) {}

    attach(handle: ReturnType<typeof setTimeout>): void {
        this.handle = handle;
    }

    get active(): boolean {
        return !this.cleared;
    }

    cancel(): void {
        if (this.cleared) return;
        this.cleared = true;
        if (this.handle !== null) {
            this.clear(this.handle);
            this.handle = null;
        }
    }

    /** Marks a one-shot task as spent without clearing the timer. */
    finish(): void {
        this.cleared = true;
        this.handle = null;
    }
}

/** Longest delay Node accepts; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/** Scheduler backed by the global `setTimeout`/`setInterval`. */
export const timerScheduler: Scheduler = {
    once(delayMs, callback) {
        const task = new TimerTask((handle) => clearTimeout(handle));
        // Longer delays are chained under the same task.
        const arm = (remainingMs: number) => {
            const stepMs = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
            task.attach(
                setTimeout(() => {
                    if (!task.active) return;
                    if (remainingMs > stepMs) {
                        arm(remainingMs - stepMs);
                        return;
                    }
                    task.finish();
                    callback();
                }, stepMs)
            );
        };
        arm(delayMs);
        return task;
    },

    every(intervalMs, callback) {
        const task = new TimerTask((handle) => clearInterval(handle));
        task.attach(
            setInterval(() => {
                if (!task.active) return;
                callback();
            }, intervalMs)
        );
        return task;
    },
};
