import logger from '../utils/logger.js';

/**
 * FIFO async mutex.
 *
 * Login clients are driven one at a time per process: the answer slot read
 * and the client call have to happen as one unit, and third-party clients are
 * rarely re-entrant. Every login attempt runs inside `loginLock`.
 */
export class ExclusiveLock {
    private locked = false;
    private readonly waiters: Array<() => void> = [];

    constructor(private readonly name: string = 'exclusive') { }

    get isLocked(): boolean {
        return this.locked;
    }

    get pendingCount(): number {
        return this.waiters.length;
    }

    async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await fn();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (!this.locked) {
            this.locked = true;
            return Promise.resolve();
        }

        logger.debug({ lock: this.name, queued: this.waiters.length + 1 }, 'Lock busy, queuing');
        return new Promise<void>(resolve => {
            this.waiters.push(resolve);
        });
    }

    private release(): void {
        const next = this.waiters.shift();
        if (next) {
            // Ownership passes straight to the next waiter
            next();
        } else {
            this.locked = false;
        }
    }
}

export const loginLock = new ExclusiveLock('login');
