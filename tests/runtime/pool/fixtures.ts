import { PoolEngine, PoolEventBus, TokenLedger, isPoolError, type CustodyAccount, type NotificationSink, type PoolErrorCode } from '../../../src/runtime/pool/index.js';

export const FUNDS = 1_000_000n;
export const POOL_ACCOUNT = 'pool';

export interface PoolFixture {
    engine: PoolEngine;
    tokenA: TokenLedger;
    tokenB: TokenLedger;
    bus: PoolEventBus;
}

/**
 * Empty pool over two fresh ledgers; alice and bob hold FUNDS of each token
 */
export function createPool(custody?: { a?: CustodyAccount; b?: CustodyAccount; sink?: NotificationSink }): PoolFixture {
    const tokenA = new TokenLedger('TKA', POOL_ACCOUNT);
    const tokenB = new TokenLedger('TKB', POOL_ACCOUNT);
    const bus = new PoolEventBus();
    for (const who of ['alice', 'bob']) {
        tokenA.mint(who, FUNDS);
        tokenB.mint(who, FUNDS);
    }
    const engine = new PoolEngine({
        custodyA: custody?.a ?? tokenA,
        custodyB: custody?.b ?? tokenB,
        sink: custody?.sink ?? bus,
    });
    return { engine, tokenA, tokenB, bus };
}

/**
 * Custody that delegates to a ledger until told to refuse or throw
 */
export class FlakyCustody implements CustodyAccount {
    failPull = false;
    failPush = false;
    throwOnPull: Error | null = null;
    onPull: ((who: string, amount: bigint) => void) | null = null;
    calls: string[] = [];

    constructor(private readonly ledger: TokenLedger) {}

    get symbol(): string {
        return this.ledger.symbol;
    }

    pullFrom(who: string, amount: bigint): boolean {
        this.calls.push(`pull ${who} ${amount}`);
        this.onPull?.(who, amount);
        if (this.throwOnPull) throw this.throwOnPull;
        if (this.failPull) return false;
        return this.ledger.pullFrom(who, amount);
    }

    pushTo(who: string, amount: bigint): boolean {
        this.calls.push(`push ${who} ${amount}`);
        if (this.failPush) return false;
        return this.ledger.pushTo(who, amount);
    }
}

/**
 * Code of the PoolError `fn` throws; fails the test when it throws anything else or nothing
 */
export function poolErrorCode(fn: () => unknown): PoolErrorCode {
    try {
        fn();
    } catch (error) {
        if (isPoolError(error)) return error.code;
        throw error;
    }
    throw new Error('Expected a PoolError, nothing was thrown');
}
