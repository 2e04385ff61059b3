/**
 * Pool Errors
 *
 * Every failure the engine reports is a PoolError carrying one of these codes.
 * Most are raised before any state change. CustodyTransferFailed and
 * InvariantViolation come after the mutation and the engine rolls it back.
 */

export type PoolErrorCode =
    | 'ZeroAmount'
    | 'ZeroSwapAmount'
    | 'RatioMismatch'
    | 'InsufficientInitialLiquidity'
    | 'InsufficientLiquidityMinted'
    | 'InsufficientShares'
    | 'NoLiquidity'
    | 'InsufficientOutput'
    | 'CustodyTransferFailed'
    | 'InvariantViolation'
    | 'PoolBusy'
    | 'CorruptSnapshot';

export class PoolError extends Error {
    public readonly code: PoolErrorCode;
    public override readonly cause?: unknown;

    constructor(code: PoolErrorCode, message: string, cause?: unknown) {
        super(message);
        this.name = 'PoolError';
        this.code = code;
        this.cause = cause;
    }
}

export function isPoolError(error: unknown, code?: PoolErrorCode): error is PoolError {
    if (!(error instanceof PoolError)) return false;
    return code === undefined || error.code === code;
}
