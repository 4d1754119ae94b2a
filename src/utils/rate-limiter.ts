/**
 * Single-slot minimum-interval throttle.
 *
 * Callers of `wait()` are released one at a time, in arrival order, and no two
 * consecutive releases are closer than `minIntervalMs`. Idle time is not
 * banked: there is no burst capacity.
 */
export class RateLimiter {
    private lastRelease = Number.NEGATIVE_INFINITY;
    private tail: Promise<void> = Promise.resolve();

    constructor(
        private readonly minIntervalMs: number,
        private readonly now: () => number = () => performance.now()
    ) {}

    get intervalMs(): number {
        return this.minIntervalMs;
    }

    /**
     * Resolve once this caller may dispatch its request.
     */
    wait(): Promise<void> {
        if (this.minIntervalMs <= 0) {
            return Promise.resolve();
        }

        // Chain onto the previous caller; reserve() never rejects, so the chain
        // cannot break.
        const turn = this.tail.then(() => this.reserve());
        this.tail = turn;
        return turn;
    }

    private async reserve(): Promise<void> {
        const elapsed = this.now() - this.lastRelease;
        if (elapsed < this.minIntervalMs) {
            await sleep(this.minIntervalMs - elapsed);
        }
        this.lastRelease = this.now();
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
