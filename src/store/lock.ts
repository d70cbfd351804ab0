/**
 * Keyed in-process lock with TTL
 *
 * acquire/release give mutex-like behaviour per key. The TTL keeps a request
 * that died without releasing from blocking the key forever.
 * Each acquisition gets its own token and only that token releases the lock,
 * so a holder whose TTL ran out cannot free a lock taken after it.
 * Only serializes requests within one process; the store itself stays unlocked.
 */
export class KeyedLock {
    private _locks: Map<string, { token: string; expiresAt: number }> = new Map();
    private _issued = 0;

    /**
     * @param ttlMs - Default lock time-to-live in milliseconds
     */
    constructor(private readonly ttlMs: number = 5000) { }

    /**
     * Acquire a lock
     *
     * If a lock is held and not expired, acquisition fails. Expired locks are replaced.
     *
     * @returns token to release with, or null if the lock is held by another request
     */
    acquire(key: string, ttlMs: number = this.ttlMs): string | null {
        const now = Date.now();
        const existing = this._locks.get(key);
        if (existing && existing.expiresAt > now) {
            return null;
        }
        this._issued += 1;
        const token = `${key}:${now}:${this._issued}`;
        this._locks.set(key, { token, expiresAt: now + ttlMs });
        return token;
    }

    /**
     * Release a lock, if `token` still owns it
     *
     * @returns true if the lock was released
     */
    release(key: string, token: string): boolean {
        if (this._locks.get(key)?.token !== token) return false;
        this._locks.delete(key);
        return true;
    }
}
