/**
 * Box contents for the pool commands
 */

import { isPoolError, type LiquidityAddedResult, type LiquidityRemovedResult, type PoolInfo, type SwapQuote, type SwapResult } from '../../runtime/pool/index.js';
import { InputValidationError } from '../../protocol/security/input-validator.js';
import { rows, formatAmount, sym } from '../../protocol/utils/cli.js';
import type { Balances } from '../PoolService.js';

export function poolInfoView(info: PoolInfo): string {
    return rows([
        [`Reserve ${info.symbolA}`, formatAmount(info.reserveA)],
        [`Reserve ${info.symbolB}`, formatAmount(info.reserveB)],
        ['Price', info.price === null ? 'n/a' : `1 ${info.symbolA} = ${formatAmount(info.price)} ${info.symbolB}`],
        ['k', formatAmount(info.k)],
        ['Total shares', formatAmount(info.totalShares)],
        ['Providers', info.providers.toString()],
    ]);
}

export function quoteView(quote: SwapQuote, symbolIn: string, symbolOut: string): string {
    return rows([
        ['Route', `${symbolIn} ${sym.arrow} ${symbolOut}`],
        ['From', `${formatAmount(quote.amountIn)} ${symbolIn}`],
        ['To', `${formatAmount(quote.amountOut)} ${symbolOut}`],
        ['Fee', '0.3%'],
    ]);
}

export function swapView(result: SwapResult, symbolIn: string, symbolOut: string): string {
    return rows([
        ['Caller', result.caller],
        ['In', `${formatAmount(result.amountIn)} ${symbolIn}`],
        ['Out', `${formatAmount(result.amountOut)} ${symbolOut}`],
    ]);
}

export function addedView(result: LiquidityAddedResult, symbolA: string, symbolB: string): string {
    return rows([
        ['Provider', result.provider],
        ['Added', `${formatAmount(result.amountA)} ${symbolA} + ${formatAmount(result.amountB)} ${symbolB}`],
        ['Shares', formatAmount(result.sharesMinted)],
    ]);
}

export function removedView(result: LiquidityRemovedResult, symbolA: string, symbolB: string): string {
    return rows([
        ['Provider', result.provider],
        ['Burned', `${formatAmount(result.sharesBurned)} shares`],
        ['Got', `${formatAmount(result.amountA)} ${symbolA} + ${formatAmount(result.amountB)} ${symbolB}`],
    ]);
}

export function balancesView(balances: Balances, symbolA: string, symbolB: string): string {
    return rows([
        ['Address', balances.address],
        [symbolA, formatAmount(balances.tokenA)],
        [symbolB, formatAmount(balances.tokenB)],
        ['Shares', formatAmount(balances.shares)],
    ]);
}

/**
 * One-line description of a failure, with the pool error code when there is one
 */
export function describeError(error: unknown): string {
    if (isPoolError(error)) return `[${error.code}] ${error.message}`;
    if (error instanceof InputValidationError) return `[InvalidInput] ${error.message}`;
    if (error instanceof Error) return error.message;
    return 'Unknown error';
}
