import { logger } from '../utils/logger.js';

const log = logger.child('TxGuard');

/**
 * Mutual exclusion for one pool instance.
 *
 * Operations are synchronous, so a second acquire while the lock is held can
 * only come from a callback re-entering the pool mid-operation.
 */
export class TxLock {
    private holder: string | null = null;

    constructor(private readonly scope: string) {}

    acquire(operation: string): boolean {
        if (this.holder !== null) {
            log.warn(`🔒 Reentrancy blocked on ${this.scope}: ${operation} during ${this.holder}`);
            return false;
        }
        this.holder = operation;
        return true;
    }

    release(): void {
        this.holder = null;
    }

    currentHolder(): string | null {
        return this.holder;
    }
}

/**
 * Run `fn` under `lock`; `onBusy` builds the error thrown when it is taken.
 */
export function withTxLock<T>(lock: TxLock, operation: string, fn: () => T, onBusy: () => Error): T {
    if (!lock.acquire(operation)) throw onBusy();
    try {
        return fn();
    } finally {
        lock.release();
    }
}
