import { describe, it, expect, beforeEach } from 'vitest';
import { PoolEngine, TokenLedger, isPoolError, type PoolErrorCode, type PoolNotification } from '../../../src/runtime/pool/index.js';
import { FlakyCustody, createPool, poolErrorCode, FUNDS, POOL_ACCOUNT } from './fixtures.js';

interface FlakyPool {
    engine: PoolEngine;
    tokenA: TokenLedger;
    tokenB: TokenLedger;
    a: FlakyCustody;
    b: FlakyCustody;
    seen: PoolNotification[];
}

function flakyPool(): FlakyPool {
    const tokenA = new TokenLedger('TKA', POOL_ACCOUNT);
    const tokenB = new TokenLedger('TKB', POOL_ACCOUNT);
    for (const who of ['alice', 'bob']) {
        tokenA.mint(who, FUNDS);
        tokenB.mint(who, FUNDS);
    }
    const a = new FlakyCustody(tokenA);
    const b = new FlakyCustody(tokenB);
    const seen: PoolNotification[] = [];
    const engine = new PoolEngine({ custodyA: a, custodyB: b, sink: { notify: (n) => { seen.push(n); } } });
    return { engine, tokenA, tokenB, a, b, seen };
}

describe('Rollback on custody failure', () => {
    let pool: FlakyPool;
    beforeEach(() => { pool = flakyPool(); });

    it('returns the first leg when the second pull is refused', () => {
        pool.b.failPull = true;
        expect(poolErrorCode(() => pool.engine.provideLiquidity(100n, 200n, 'alice'))).toBe('CustodyTransferFailed');

        expect(pool.a.calls).toEqual(['pull alice 100', 'push alice 100']);
        expect(pool.engine.getReserves()).toEqual({ reserveA: 0n, reserveB: 0n });
        expect(pool.engine.totalShares()).toBe(0n);
        expect(pool.engine.shareOf('alice')).toBe(0n);
        expect(pool.tokenA.balanceOf('alice')).toBe(FUNDS);
        expect(pool.tokenB.balanceOf('alice')).toBe(FUNDS);
        expect(pool.seen).toEqual([]);
    });

    it('reclaims the input when the swap payout is refused', () => {
        pool.engine.provideLiquidity(100n, 200n, 'alice');
        pool.b.failPush = true;

        expect(poolErrorCode(() => pool.engine.swapAForB(10n, 'bob'))).toBe('CustodyTransferFailed');
        expect(pool.engine.getReserves()).toEqual({ reserveA: 100n, reserveB: 200n });
        expect(pool.tokenA.balanceOf('bob')).toBe(FUNDS);
        expect(pool.tokenB.balanceOf('bob')).toBe(FUNDS);
        expect(pool.tokenA.balanceOf(POOL_ACCOUNT)).toBe(100n);
        expect(pool.seen.map((n) => n.type)).toEqual(['LiquidityAdded']);
    });

    it('restores shares when a withdrawal leg is refused', () => {
        pool.engine.provideLiquidity(100n, 200n, 'alice');
        pool.b.failPush = true;

        expect(poolErrorCode(() => pool.engine.removeLiquidity(70n, 'alice'))).toBe('CustodyTransferFailed');
        expect(pool.engine.shareOf('alice')).toBe(141n);
        expect(pool.engine.totalShares()).toBe(141n);
        expect(pool.engine.getReserves()).toEqual({ reserveA: 100n, reserveB: 200n });
        expect(pool.tokenA.balanceOf('alice')).toBe(FUNDS - 100n);
    });

    it('keeps the custody error as the cause', () => {
        const failure = new Error('ledger offline');
        pool.a.throwOnPull = failure;

        let caught: unknown;
        try {
            pool.engine.provideLiquidity(100n, 200n, 'alice');
        } catch (error) {
            caught = error;
        }
        expect(isPoolError(caught, 'CustodyTransferFailed')).toBe(true);
        expect(isPoolError(caught) ? caught.cause : undefined).toBe(failure);
        expect(pool.engine.totalShares()).toBe(0n);
    });

    it('accepts operations again after a rollback', () => {
        pool.b.failPull = true;
        poolErrorCode(() => pool.engine.provideLiquidity(100n, 200n, 'alice'));
        pool.b.failPull = false;

        expect(pool.engine.provideLiquidity(100n, 200n, 'alice').sharesMinted).toBe(141n);
    });
});

describe('Reentrancy', () => {
    it('rejects a nested call from custody with PoolBusy', () => {
        const pool = flakyPool();
        const nested: PoolErrorCode[] = [];
        pool.a.onPull = () => {
            pool.a.onPull = null;
            nested.push(poolErrorCode(() => pool.engine.swapBForA(5n, 'bob')));
        };

        const result = pool.engine.provideLiquidity(100n, 200n, 'alice');
        expect(nested).toEqual(['PoolBusy']);
        expect(result.sharesMinted).toBe(141n);
        expect(pool.engine.getReserves()).toEqual({ reserveA: 100n, reserveB: 200n });
    });

    it('lets reads through while an operation runs', () => {
        const pool = flakyPool();
        const observed: bigint[] = [];
        pool.a.onPull = () => { observed.push(pool.engine.totalShares()); };

        pool.engine.provideLiquidity(100n, 200n, 'alice');
        // State is updated before the transfers run
        expect(observed).toEqual([141n]);
    });

    it('releases the lock so sinks may call back in', () => {
        const { engine, bus } = createPool();
        const results: bigint[] = [];
        bus.on('LiquidityAdded', (n) => {
            if (n.provider === 'alice') results.push(engine.swapAForB(10n, 'bob').amountOut);
        });

        engine.provideLiquidity(100n, 200n, 'alice');
        expect(results).toEqual([18n]);
    });
});

describe('Notifications', () => {
    it('are emitted in operation order with their payloads', () => {
        const pool = flakyPool();
        pool.engine.provideLiquidity(100n, 200n, 'alice');
        pool.engine.swapAForB(10n, 'bob');
        pool.engine.removeLiquidity(70n, 'alice');

        expect(pool.seen).toEqual([
            { type: 'LiquidityAdded', provider: 'alice', amountA: 100n, amountB: 200n, sharesMinted: 141n },
            { type: 'Swap', caller: 'bob', direction: 'AtoB', amountIn: 10n, amountOut: 18n },
            // 70/141 of (110, 182), floored
            { type: 'LiquidityRemoved', provider: 'alice', sharesBurned: 70n, amountA: 54n, amountB: 90n },
        ]);
    });

    it('are not emitted for rejected operations', () => {
        const pool = flakyPool();
        poolErrorCode(() => pool.engine.swapAForB(10n, 'bob'));
        poolErrorCode(() => pool.engine.provideLiquidity(0n, 1n, 'alice'));
        expect(pool.seen).toEqual([]);
    });

    it('a throwing sink does not undo the operation', () => {
        const tokenA = new TokenLedger('TKA', POOL_ACCOUNT);
        const tokenB = new TokenLedger('TKB', POOL_ACCOUNT);
        tokenA.mint('alice', FUNDS);
        tokenB.mint('alice', FUNDS);
        const engine = new PoolEngine({
            custodyA: tokenA,
            custodyB: tokenB,
            sink: { notify: () => { throw new Error('sink down'); } },
        });

        const result = engine.provideLiquidity(100n, 200n, 'alice');
        expect(result.sharesMinted).toBe(141n);
        expect(engine.getReserves()).toEqual({ reserveA: 100n, reserveB: 200n });
        expect(tokenA.balanceOf(POOL_ACCOUNT)).toBe(100n);
    });
});
