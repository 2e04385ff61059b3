/**
 * Pool Module Exports
 */

export { PoolEngine } from './PoolEngine.js';
export type {
    PoolEngineOptions,
    PoolSnapshot,
    PoolInfo,
    Reserves,
    LiquidityAddedResult,
    LiquidityRemovedResult,
    SwapQuote,
    SwapResult,
} from './PoolEngine.js';

export { PoolError, isPoolError } from './errors.js';
export type { PoolErrorCode } from './errors.js';

export { isqrt, quoteOut, matchesRatio, shareOfReserve, FEE_NUMERATOR, FEE_DENOMINATOR, PRICE_SCALE } from './math.js';

export { TokenLedger } from './custody.js';
export type { CustodyAccount, TokenLedgerSnapshot } from './custody.js';

export { PoolEventBus, serializeNotification } from './events.js';
export type {
    PoolNotification,
    PoolNotificationType,
    NotificationSink,
    RecordedNotification,
    SwapDirection,
    LiquidityAddedNotification,
    LiquidityRemovedNotification,
    SwapNotification,
} from './events.js';
