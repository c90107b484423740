import { logger } from '../utils/logger';

// ── Deduplicator ───────────────────────────────────────────────────

/**
 * Remembers recently handled Discord event IDs so a dispatch replayed
 * after a Gateway resume does not trigger a second webhook call.
 */
export class Deduplicator {
    private seen = new Map<string, number>(); // eventId → expiry (ms)

    constructor(
        private readonly ttlMs = 60_000,
        private readonly now: () => number = Date.now,
    ) { }

    /**
     * Returns true if this is a DUPLICATE (should be skipped).
     * Returns false the first time an ID is seen, and records it.
     */
    isDuplicate(eventId: string): boolean {
        const now = this.now();
        this.prune(now);

        if (this.seen.has(eventId)) {
            logger.info('Duplicate event detected', { eventId });
            return true;
        }

        this.seen.set(eventId, now + this.ttlMs);
        return false;
    }

    get size(): number {
        return this.seen.size;
    }

    private prune(now: number): void {
        // Insertion order equals expiry order, so stop at the first live entry.
        for (const [id, expiresAt] of this.seen) {
            if (expiresAt > now) break;
            this.seen.delete(id);
        }
    }
}
