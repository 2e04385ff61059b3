/**
 * Constant-product math (x * y = k)
 *
 * Pure bigint functions shared by the engine, the CLI and the API.
 * All division floors, which rounds in favour of the pool.
 */

import { PoolError } from './errors.js';

// Fee: 0.3% => the trader is credited 997/1000 of the input
export const FEE_NUMERATOR = 997n;
export const FEE_DENOMINATOR = 1000n;

// Fixed-point scale for getScaledPrice()
export const PRICE_SCALE = 10n ** 18n;

/**
 * Floored integer square root (Newton's method)
 */
export function isqrt(value: bigint): bigint {
    if (value < 0n) throw new RangeError('Square root of negative number');
    if (value < 2n) return value;

    let x = value;
    let y = (x + 1n) / 2n;
    while (y < x) {
        x = y;
        y = (x + value / x) / 2n;
    }
    return x;
}

/**
 * Output of a swap of `amountIn` against hypothetical reserves, fee included.
 * Reads no pool state.
 */
export function quoteOut(amountIn: bigint, reserveIn: bigint, reserveOut: bigint): bigint {
    if (amountIn < 0n || reserveIn < 0n || reserveOut < 0n) {
        throw new RangeError('Amounts and reserves must be non-negative');
    }
    if (amountIn === 0n) return 0n;
    if (reserveIn === 0n || reserveOut === 0n) {
        throw new PoolError('NoLiquidity', 'No liquidity');
    }

    const amountInWithFee = amountIn * FEE_NUMERATOR;
    const numerator = amountInWithFee * reserveOut;
    const denominator = reserveIn * FEE_DENOMINATOR + amountInWithFee;
    return numerator / denominator;
}

/**
 * Whether (amountA, amountB) matches the reserve ratio exactly
 */
export function matchesRatio(amountA: bigint, amountB: bigint, reserveA: bigint, reserveB: bigint): boolean {
    return amountA * reserveB === amountB * reserveA;
}

/**
 * Proportional claim of `shares` on `reserve`, floored
 */
export function shareOfReserve(shares: bigint, reserve: bigint, totalShares: bigint): bigint {
    if (totalShares === 0n) return 0n;
    return (shares * reserve) / totalShares;
}
