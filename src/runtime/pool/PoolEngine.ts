/**
 * Pool Engine (constant product, x * y = k)
 *
 * One instance owns one pool: two reserves and the LP share ledger.
 * Every mutation runs as validate → mutate → transfer → notify, under the
 * pool's TxLock. A failed transfer restores the previous state and undoes the
 * legs of the same operation that already went through.
 *
 * INVARIANTS (checked on every transition):
 * - reserveA > 0 && reserveB > 0 when totalShares > 0, all zero otherwise
 * - totalShares == sum(shares)
 * - reserveA * reserveB never decreases across a swap
 */

import { logger, type Logger } from '../../protocol/utils/logger.js';
import { TxLock, withTxLock } from '../../protocol/security/transaction-guard.js';
import { PoolError, isPoolError } from './errors.js';
import { isqrt, quoteOut, matchesRatio, shareOfReserve, PRICE_SCALE } from './math.js';
import type { CustodyAccount } from './custody.js';
import type { NotificationSink, PoolNotification, SwapDirection } from './events.js';

// ========== INTERFACES ==========

export interface PoolEngineOptions {
    custodyA: CustodyAccount;
    custodyB: CustodyAccount;
    sink?: NotificationSink;
    /** Name used in logs and lock diagnostics */
    name?: string;
}

export interface PoolSnapshot {
    reserveA: string;
    reserveB: string;
    totalShares: string;
    shares: Record<string, string>;
}

export interface Reserves {
    reserveA: bigint;
    reserveB: bigint;
}

export interface LiquidityAddedResult {
    provider: string;
    amountA: bigint;
    amountB: bigint;
    sharesMinted: bigint;
}

export interface LiquidityRemovedResult {
    provider: string;
    sharesBurned: bigint;
    amountA: bigint;
    amountB: bigint;
}

export interface SwapQuote {
    direction: SwapDirection;
    amountIn: bigint;
    amountOut: bigint;
    /** Reserves the swap would leave behind */
    reserveA: bigint;
    reserveB: bigint;
}

export interface SwapResult extends SwapQuote {
    caller: string;
}

export interface PoolInfo {
    name: string;
    symbolA: string;
    symbolB: string;
    reserveA: bigint;
    reserveB: bigint;
    totalShares: bigint;
    providers: number;
    k: bigint;
    price: bigint | null;
}

interface PoolState {
    reserveA: bigint;
    reserveB: bigint;
    totalShares: bigint;
    shares: Map<string, bigint>;
}

interface Outcome<T> {
    result: T;
    notification: PoolNotification;
}

// ========== TRANSFERS ==========

/**
 * Runs the custody legs of one operation and remembers how to undo them.
 */
class TransferPlan {
    private undo: Array<{ describe: string; run: () => boolean }> = [];

    constructor(private readonly log: Logger) {}

    pull(custody: CustodyAccount, who: string, amount: bigint): void {
        if (amount === 0n) return;
        this.attempt(`pull ${amount} ${custody.symbol} from ${who}`, () => custody.pullFrom(who, amount));
        this.undo.push({
            describe: `return ${amount} ${custody.symbol} to ${who}`,
            run: () => custody.pushTo(who, amount),
        });
    }

    push(custody: CustodyAccount, who: string, amount: bigint): void {
        if (amount === 0n) return;
        this.attempt(`push ${amount} ${custody.symbol} to ${who}`, () => custody.pushTo(who, amount));
        this.undo.push({
            describe: `reclaim ${amount} ${custody.symbol} from ${who}`,
            run: () => custody.pullFrom(who, amount),
        });
    }

    private attempt(describe: string, transfer: () => boolean): void {
        let ok: boolean;
        try {
            ok = transfer();
        } catch (error) {
            this.compensate();
            throw new PoolError('CustodyTransferFailed', `Custody transfer failed: ${describe}`, error);
        }
        if (!ok) {
            this.compensate();
            throw new PoolError('CustodyTransferFailed', `Custody transfer failed: ${describe}`);
        }
    }

    private compensate(): void {
        for (const step of this.undo.reverse()) {
            let ok = false;
            try {
                ok = step.run();
            } catch (error) {
                this.log.error(`Compensation threw: ${step.describe}`, error);
                continue;
            }
            if (!ok) {
                this.log.error(`Compensation refused by custody: ${step.describe}`);
            }
        }
        this.undo = [];
    }
}

// ========== POOL ENGINE ==========

export class PoolEngine {
    private state: PoolState = {
        reserveA: 0n,
        reserveB: 0n,
        totalShares: 0n,
        shares: new Map(),
    };

    private readonly custodyA: CustodyAccount;
    private readonly custodyB: CustodyAccount;
    private readonly sink: NotificationSink | undefined;
    private readonly lock: TxLock;
    private readonly log: Logger;
    readonly name: string;

    constructor(options: PoolEngineOptions) {
        this.custodyA = options.custodyA;
        this.custodyB = options.custodyB;
        this.sink = options.sink;
        this.name = options.name ?? `${options.custodyA.symbol}/${options.custodyB.symbol}`;
        this.lock = new TxLock(this.name);
        this.log = logger.child(`Pool ${this.name}`);
    }

    // ========== LIQUIDITY ==========

    /**
     * Deposit both assets. The first deposit sets the price and mints
     * isqrt(amountA * amountB) shares; later deposits must match the reserve
     * ratio exactly and mint proportionally.
     */
    provideLiquidity(amountA: bigint, amountB: bigint, provider: string): LiquidityAddedResult {
        return this.execute('provideLiquidity', () => {
            requireParty(provider, 'provider');
            if (amountA <= 0n || amountB <= 0n) {
                throw new PoolError('ZeroAmount', 'Zero amount: both deposit amounts must be positive');
            }

            const s = this.state;
            let sharesMinted: bigint;

            if (s.totalShares === 0n) {
                sharesMinted = isqrt(amountA * amountB);
                if (sharesMinted === 0n) {
                    throw new PoolError('InsufficientInitialLiquidity', 'Initial deposit mints no shares');
                }
            } else {
                if (!matchesRatio(amountA, amountB, s.reserveA, s.reserveB)) {
                    throw new PoolError(
                        'RatioMismatch',
                        `Ratio mismatch: ${amountA}:${amountB} does not match reserves ${s.reserveA}:${s.reserveB}`
                    );
                }
                sharesMinted = (amountA * s.totalShares) / s.reserveA;
                if (sharesMinted === 0n) {
                    throw new PoolError('InsufficientLiquidityMinted', 'Deposit too small to mint a share');
                }
            }

            s.reserveA += amountA;
            s.reserveB += amountB;
            s.totalShares += sharesMinted;
            s.shares.set(provider, (s.shares.get(provider) ?? 0n) + sharesMinted);
            this.checkReserves();

            const transfers = new TransferPlan(this.log);
            transfers.pull(this.custodyA, provider, amountA);
            transfers.pull(this.custodyB, provider, amountB);

            this.log.info(`➕ Liquidity added by ${provider}: ${amountA} ${this.custodyA.symbol} + ${amountB} ${this.custodyB.symbol} = ${sharesMinted} shares`);

            return {
                result: { provider, amountA, amountB, sharesMinted },
                notification: { type: 'LiquidityAdded', provider, amountA, amountB, sharesMinted },
            };
        });
    }

    /**
     * Burn shares for a proportional, floored cut of both reserves.
     * A leg may come out as zero through rounding; it is then not transferred.
     */
    removeLiquidity(shareAmount: bigint, provider: string): LiquidityRemovedResult {
        return this.execute('removeLiquidity', () => {
            requireParty(provider, 'provider');
            if (shareAmount <= 0n) {
                throw new PoolError('ZeroAmount', 'Zero amount: share amount must be positive');
            }

            const s = this.state;
            const owned = s.shares.get(provider) ?? 0n;
            if (shareAmount > owned) {
                throw new PoolError('InsufficientShares', `Insufficient shares: ${provider} holds ${owned}, requested ${shareAmount}`);
            }

            const amountA = shareOfReserve(shareAmount, s.reserveA, s.totalShares);
            const amountB = shareOfReserve(shareAmount, s.reserveB, s.totalShares);

            s.reserveA -= amountA;
            s.reserveB -= amountB;
            s.totalShares -= shareAmount;
            const remaining = owned - shareAmount;
            if (remaining === 0n) {
                s.shares.delete(provider);
            } else {
                s.shares.set(provider, remaining);
            }
            this.checkReserves();

            const transfers = new TransferPlan(this.log);
            transfers.push(this.custodyA, provider, amountA);
            transfers.push(this.custodyB, provider, amountB);

            this.log.info(`➖ Liquidity removed by ${provider}: ${shareAmount} shares → ${amountA} ${this.custodyA.symbol} + ${amountB} ${this.custodyB.symbol}`);

            return {
                result: { provider, sharesBurned: shareAmount, amountA, amountB },
                notification: { type: 'LiquidityRemoved', provider, sharesBurned: shareAmount, amountA, amountB },
            };
        });
    }

    // ========== SWAP ==========

    swapAForB(amountIn: bigint, caller: string): SwapResult {
        return this.swap('AtoB', amountIn, caller);
    }

    swapBForA(amountIn: bigint, caller: string): SwapResult {
        return this.swap('BtoA', amountIn, caller);
    }

    private swap(direction: SwapDirection, amountIn: bigint, caller: string): SwapResult {
        return this.execute(direction === 'AtoB' ? 'swapAForB' : 'swapBForA', () => {
            requireParty(caller, 'caller');
            const quote = this.computeSwap(direction, amountIn);

            const s = this.state;
            const kBefore = s.reserveA * s.reserveB;
            s.reserveA = quote.reserveA;
            s.reserveB = quote.reserveB;
            const kAfter = s.reserveA * s.reserveB;
            if (kAfter < kBefore) {
                throw new PoolError('InvariantViolation', `Invariant violation: k decreased from ${kBefore} to ${kAfter}`);
            }
            this.checkReserves();

            const [custodyIn, custodyOut] = direction === 'AtoB'
                ? [this.custodyA, this.custodyB]
                : [this.custodyB, this.custodyA];

            const transfers = new TransferPlan(this.log);
            transfers.pull(custodyIn, caller, amountIn);
            transfers.push(custodyOut, caller, quote.amountOut);

            this.log.info(`💱 Swap by ${caller}: ${amountIn} ${custodyIn.symbol} → ${quote.amountOut} ${custodyOut.symbol}`);

            return {
                result: { ...quote, caller },
                notification: { type: 'Swap', caller, direction, amountIn, amountOut: quote.amountOut },
            };
        });
    }

    private computeSwap(direction: SwapDirection, amountIn: bigint): SwapQuote {
        if (amountIn <= 0n) {
            throw new PoolError('ZeroSwapAmount', 'Zero swap: amount in must be positive');
        }
        const s = this.state;
        if (s.totalShares === 0n) {
            throw new PoolError('NoLiquidity', 'No liquidity');
        }

        const [reserveIn, reserveOut] = direction === 'AtoB'
            ? [s.reserveA, s.reserveB]
            : [s.reserveB, s.reserveA];

        const amountOut = quoteOut(amountIn, reserveIn, reserveOut);
        if (amountOut === 0n) {
            throw new PoolError('InsufficientOutput', `Insufficient output: ${amountIn} in yields nothing`);
        }
        if (amountOut >= reserveOut) {
            throw new PoolError('InsufficientOutput', 'Insufficient output: swap would drain the reserve');
        }

        const newIn = reserveIn + amountIn;
        const newOut = reserveOut - amountOut;
        return {
            direction,
            amountIn,
            amountOut,
            reserveA: direction === 'AtoB' ? newIn : newOut,
            reserveB: direction === 'AtoB' ? newOut : newIn,
        };
    }

    // ========== QUERIES ==========

    getReserves(): Reserves {
        return { reserveA: this.state.reserveA, reserveB: this.state.reserveB };
    }

    /**
     * Whole units of B per unit of A, floored
     */
    getPrice(): bigint {
        if (this.state.reserveA === 0n) {
            throw new PoolError('NoLiquidity', 'No liquidity');
        }
        return this.state.reserveB / this.state.reserveA;
    }

    /**
     * B per A as a fixed-point integer: reserveB * scale / reserveA
     */
    getScaledPrice(scale: bigint = PRICE_SCALE): bigint {
        if (scale <= 0n) throw new RangeError('Scale must be positive');
        if (this.state.reserveA === 0n) {
            throw new PoolError('NoLiquidity', 'No liquidity');
        }
        return (this.state.reserveB * scale) / this.state.reserveA;
    }

    shareOf(provider: string): bigint {
        return this.state.shares.get(provider) ?? 0n;
    }

    totalShares(): bigint {
        return this.state.totalShares;
    }

    quoteOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
        return quoteOut(amountIn, reserveIn, reserveOut);
    }

    /**
     * What a swap would return against the current reserves. Read-only.
     */
    quote(direction: SwapDirection, amountIn: bigint): SwapQuote {
        return this.computeSwap(direction, amountIn);
    }

    providers(): Array<[string, bigint]> {
        return Array.from(this.state.shares.entries());
    }

    getPoolInfo(): PoolInfo {
        const s = this.state;
        return {
            name: this.name,
            symbolA: this.custodyA.symbol,
            symbolB: this.custodyB.symbol,
            reserveA: s.reserveA,
            reserveB: s.reserveB,
            totalShares: s.totalShares,
            providers: s.shares.size,
            k: s.reserveA * s.reserveB,
            price: s.reserveA === 0n ? null : s.reserveB / s.reserveA,
        };
    }

    // ========== SERIALIZATION ==========

    snapshot(): PoolSnapshot {
        const s = this.state;
        return {
            reserveA: s.reserveA.toString(),
            reserveB: s.reserveB.toString(),
            totalShares: s.totalShares.toString(),
            shares: Object.fromEntries(
                Array.from(s.shares.entries()).map(([provider, shares]) => [provider, shares.toString()])
            ),
        };
    }

    /**
     * Replace the pool state with a snapshot, rejecting inconsistent ones
     */
    restore(data: PoolSnapshot): void {
        withTxLock(this.lock, 'restore', () => {
            const next: PoolState = {
                reserveA: parseSnapshotAmount(data.reserveA, 'reserveA'),
                reserveB: parseSnapshotAmount(data.reserveB, 'reserveB'),
                totalShares: parseSnapshotAmount(data.totalShares, 'totalShares'),
                shares: new Map(),
            };

            let sum = 0n;
            for (const [provider, raw] of Object.entries(data.shares ?? {})) {
                const shares = parseSnapshotAmount(raw, `shares[${provider}]`);
                if (shares === 0n) continue;
                next.shares.set(provider, shares);
                sum += shares;
            }

            if (sum !== next.totalShares) {
                throw new PoolError('CorruptSnapshot', `Corrupt snapshot: shares sum to ${sum}, totalShares is ${next.totalShares}`);
            }
            if (!reservesConsistent(next)) {
                throw new PoolError('CorruptSnapshot', 'Corrupt snapshot: reserves and totalShares disagree on emptiness');
            }

            this.state = next;
            this.log.info(`📂 Pool loaded: ${next.reserveA} ${this.custodyA.symbol}, ${next.reserveB} ${this.custodyB.symbol}, ${next.totalShares} shares`);
        }, () => this.busy('restore'));
    }

    // ========== INTERNALS ==========

    private execute<T>(operation: string, body: () => Outcome<T>): T {
        const outcome = withTxLock(this.lock, operation, () => {
            const saved = cloneState(this.state);
            try {
                return body();
            } catch (error) {
                this.state = saved;
                if (isPoolError(error, 'CustodyTransferFailed') || isPoolError(error, 'InvariantViolation')) {
                    this.log.warn(`↩️ ${operation} rolled back: ${error.message}`);
                }
                throw error;
            }
        }, () => this.busy(operation));

        this.dispatch(outcome.notification);
        return outcome.result;
    }

    private dispatch(notification: PoolNotification): void {
        if (!this.sink) return;
        try {
            this.sink.notify(notification);
        } catch (error) {
            // The operation is already committed; a sink cannot undo it.
            this.log.error(`Notification sink failed on ${notification.type}`, error);
        }
    }

    private checkReserves(): void {
        if (!reservesConsistent(this.state)) {
            const s = this.state;
            throw new PoolError(
                'InvariantViolation',
                `Invariant violation: reserves ${s.reserveA}/${s.reserveB} with ${s.totalShares} shares`
            );
        }
    }

    private busy(operation: string): PoolError {
        return new PoolError('PoolBusy', `Pool ${this.name} is busy with ${this.lock.currentHolder() ?? 'another operation'}; ${operation} rejected`);
    }
}

// ========== HELPERS ==========

function cloneState(state: PoolState): PoolState {
    return { ...state, shares: new Map(state.shares) };
}

function reservesConsistent(state: PoolState): boolean {
    if (state.totalShares === 0n) {
        return state.reserveA === 0n && state.reserveB === 0n;
    }
    return state.reserveA > 0n && state.reserveB > 0n;
}

function requireParty(id: string, role: string): void {
    if (id.length === 0) {
        throw new RangeError(`${role} identity required`);
    }
}

function parseSnapshotAmount(raw: unknown, field: string): bigint {
    if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
        throw new PoolError('CorruptSnapshot', `Corrupt snapshot: ${field} is not a non-negative integer`);
    }
    return BigInt(raw);
}
