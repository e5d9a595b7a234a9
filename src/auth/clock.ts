/** Cancels a timer armed with {@link Clock.schedule}. */
export type CancelTimer = () => void;

export interface Clock {
    now(): number;
    schedule(callback: () => void, delayMs: number): CancelTimer;
}

export const systemClock: Clock = {
    now: () => Date.now(),
    schedule(callback, delayMs) {
        const handle = setTimeout(callback, delayMs);
        handle.unref();    // a pending refresh must not keep the process alive
        return () => clearTimeout(handle);
    },
};
