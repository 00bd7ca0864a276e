export interface Clock {
    now(): Date;
}

export const systemClock: Clock = {
    now: () => new Date(),
};

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Blocking wait. An abort ends the wait early instead of rejecting, so callers
 * check the signal themselves once the wait returns.
 */
export const sleep: Sleeper = (ms, signal) =>
    new Promise<void>((resolve) => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const finish = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', finish);
            resolve();
        };
        const timer = setTimeout(finish, ms);
        signal?.addEventListener('abort', finish, { once: true });
    });

/**
 * `YYYY-MM-DD` of `date` as seen in `timeZone`, or in the process time zone
 * when none is given.
 */
export function calendarDay(date: Date, timeZone?: string): string {
    return new Intl.DateTimeFormat('en-CA', { timeZone, year: 'numeric', month: '2-digit', day: '2-digit' }).format(date);
}
