/**
 * Sliding Window Rate Limiter
 *
 * Tracks command timestamps per chat. Each call to {@link SlidingWindowRateLimiter.allow}
 * prunes, checks and records in one synchronous block, so concurrent handlers
 * on the event loop cannot interleave inside it.
 */

export class SlidingWindowRateLimiter {
    private readonly windows = new Map<number, number[]>();

    /**
     * Admits a request iff fewer than `maxRequests` were admitted for this chat
     * in the trailing window. Rejected requests are not recorded.
     *
     * @param now - Current time in milliseconds
     */
    allow(chatId: number, now: number, maxRequests: number, windowSeconds: number): boolean {
        const windowStart = now - windowSeconds * 1000;
        const recent = (this.windows.get(chatId) ?? []).filter(timestamp => timestamp > windowStart);

        if (recent.length >= maxRequests) {
            this.windows.set(chatId, recent);
            return false;
        }

        recent.push(now);
        this.windows.set(chatId, recent);
        return true;
    }

    /**
     * Number of admitted requests still inside the window as of the last check
     */
    getCount(chatId: number): number {
        return this.windows.get(chatId)?.length ?? 0;
    }

    reset(): void {
        this.windows.clear();
    }
}
