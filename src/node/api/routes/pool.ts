/**
 * Pool API Routes
 *
 * Amounts travel as decimal strings in both directions.
 * Responses use the { success, data } / { success, error, code } envelope.
 */

import { Router, Request, Response } from 'express';
import { isPoolError, serializeNotification, type PoolErrorCode } from '../../../runtime/pool/index.js';
import { InputValidationError, parseAmount, parseParty, parseSide } from '../../../protocol/security/input-validator.js';
import { logger } from '../../../protocol/utils/logger.js';
import type { PoolService } from '../../PoolService.js';

const log = logger.child('API');

type Json = string | number | boolean | null | Json[] | { [key: string]: Json };

/**
 * bigint → decimal string, recursively
 */
export function toJson(value: unknown): Json {
    if (typeof value === 'bigint') return value.toString();
    if (value === null || value === undefined) return null;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
    if (Array.isArray(value)) return value.map(toJson);
    if (typeof value === 'object') {
        const out: { [key: string]: Json } = {};
        for (const [key, inner] of Object.entries(value)) out[key] = toJson(inner);
        return out;
    }
    return String(value);
}

const STATUS_BY_CODE: Partial<Record<PoolErrorCode, number>> = {
    PoolBusy: 409,
    InvariantViolation: 500,
    CorruptSnapshot: 500,
};

function sendError(res: Response, error: unknown, fallback: string): void {
    if (isPoolError(error)) {
        res.status(STATUS_BY_CODE[error.code] ?? 400).json({ success: false, error: error.message, code: error.code });
        return;
    }
    if (error instanceof InputValidationError || error instanceof RangeError) {
        res.status(400).json({ success: false, error: error.message, code: 'InvalidInput' });
        return;
    }
    log.error(`${fallback}:`, error);
    res.status(500).json({ success: false, error: error instanceof Error ? error.message : fallback });
}

function body(req: Request): Record<string, unknown> {
    const raw: unknown = req.body;
    return typeof raw === 'object' && raw !== null ? { ...raw } : {};
}

export function createPoolRoutes(service: PoolService): Router {
    const router = Router();
    const { symbol: symbolA } = service.tokenA;
    const { symbol: symbolB } = service.tokenB;

    /**
     * GET /api/pool/info
     */
    router.get('/info', (_req: Request, res: Response) => {
        try {
            res.json({ success: true, data: toJson(service.info()) });
        } catch (error) {
            sendError(res, error, 'Info failed');
        }
    });

    /**
     * GET /api/pool/quote?from=A&amount=1000
     */
    router.get('/quote', (req: Request, res: Response) => {
        try {
            const from = parseSide(req.query.from, symbolA, symbolB);
            const quote = service.quote(from, parseAmount(req.query.amount));
            res.json({ success: true, data: toJson(quote) });
        } catch (error) {
            sendError(res, error, 'Quote failed');
        }
    });

    /**
     * GET /api/pool/share/:provider
     */
    router.get('/share/:provider', (req: Request, res: Response) => {
        try {
            const provider = parseParty(req.params.provider, 'provider');
            res.json({ success: true, data: toJson(service.shareOf(provider)) });
        } catch (error) {
            sendError(res, error, 'Share lookup failed');
        }
    });

    /**
     * GET /api/pool/balance/:address
     */
    router.get('/balance/:address', (req: Request, res: Response) => {
        try {
            const address = parseParty(req.params.address);
            res.json({ success: true, data: toJson(service.balances(address)) });
        } catch (error) {
            sendError(res, error, 'Balance lookup failed');
        }
    });

    /**
     * GET /api/pool/events?limit=20
     */
    router.get('/events', (req: Request, res: Response) => {
        try {
            const limit = req.query.limit === undefined ? undefined : Number(parseAmount(req.query.limit, 'limit'));
            const events = service.events.recent(limit).map((entry) => ({
                seq: entry.seq,
                at: entry.at,
                ...serializeNotification(entry.notification),
            }));
            res.json({ success: true, data: events });
        } catch (error) {
            sendError(res, error, 'Events failed');
        }
    });

    /**
     * POST /api/pool/add { provider, amountA, amountB }
     */
    router.post('/add', (req: Request, res: Response) => {
        try {
            const input = body(req);
            const result = service.addLiquidity(
                parseParty(input.provider, 'provider'),
                parseAmount(input.amountA, 'amountA'),
                parseAmount(input.amountB, 'amountB'),
            );
            res.json({ success: true, data: toJson(result) });
        } catch (error) {
            sendError(res, error, 'Add liquidity failed');
        }
    });

    /**
     * POST /api/pool/remove { provider, shares }
     */
    router.post('/remove', (req: Request, res: Response) => {
        try {
            const input = body(req);
            const result = service.removeLiquidity(
                parseParty(input.provider, 'provider'),
                parseAmount(input.shares, 'shares'),
            );
            res.json({ success: true, data: toJson(result) });
        } catch (error) {
            sendError(res, error, 'Remove liquidity failed');
        }
    });

    /**
     * POST /api/pool/swap { from, amountIn, caller }
     */
    router.post('/swap', (req: Request, res: Response) => {
        try {
            const input = body(req);
            const from = parseSide(input.from, symbolA, symbolB);
            const result = service.swap(from, parseAmount(input.amountIn, 'amountIn'), parseParty(input.caller, 'caller'));
            res.json({ success: true, data: toJson(result) });
        } catch (error) {
            sendError(res, error, 'Swap failed');
        }
    });

    /**
     * POST /api/pool/faucet { address, amount? }
     */
    router.post('/faucet', (req: Request, res: Response) => {
        try {
            const input = body(req);
            const address = parseParty(input.address);
            const balances = input.amount === undefined
                ? service.faucet(address)
                : service.faucet(address, parseAmount(input.amount));
            res.json({ success: true, data: toJson(balances) });
        } catch (error) {
            sendError(res, error, 'Faucet failed');
        }
    });

    return router;
}
