/**
 * Pool Service
 *
 * Wires one PoolEngine to its two in-memory token ledgers, the event bus and
 * the state file. The CLI and the HTTP API both go through this class; every
 * successful mutation is saved before the call returns.
 */

import {
    PoolEngine,
    PoolEventBus,
    TokenLedger,
    type LiquidityAddedResult,
    type LiquidityRemovedResult,
    type PoolInfo,
    type SwapQuote,
    type SwapResult,
} from '../runtime/pool/index.js';
import { PoolStorage, type PoolStateFile } from '../protocol/storage/index.js';
import { InputValidationError } from '../protocol/security/input-validator.js';
import { logger } from '../protocol/utils/logger.js';
import type { Config } from './config.js';

const log = logger.child('PoolService');

export type Side = 'A' | 'B';

export interface Balances {
    address: string;
    tokenA: bigint;
    tokenB: bigint;
    shares: bigint;
}

export class PoolService {
    readonly engine: PoolEngine;
    readonly tokenA: TokenLedger;
    readonly tokenB: TokenLedger;
    readonly events: PoolEventBus;
    private readonly storage: PoolStorage | null;
    private readonly faucetAmount: bigint;

    /**
     * @param storage - pass null to keep everything in memory
     */
    constructor(cfg: Pick<Config, 'pool' | 'faucet' | 'api'>, storage: PoolStorage | null) {
        this.tokenA = new TokenLedger(cfg.pool.symbolA, cfg.pool.account);
        this.tokenB = new TokenLedger(cfg.pool.symbolB, cfg.pool.account);
        this.events = new PoolEventBus(cfg.api.eventHistory);
        this.engine = new PoolEngine({
            custodyA: this.tokenA,
            custodyB: this.tokenB,
            sink: this.events,
        });
        this.storage = storage;
        this.faucetAmount = cfg.faucet.amount;
    }

    static fromConfig(cfg: Config): PoolService {
        const service = new PoolService(cfg, new PoolStorage(cfg.storage.dataDir, cfg.storage.stateFile));
        service.load();
        return service;
    }

    // ========== PERSISTENCE ==========

    load(): boolean {
        if (!this.storage) return false;
        const data = this.storage.load();
        if (!data) {
            log.debug('No saved pool state, starting empty');
            return false;
        }
        // All three restore or none do
        const previous = this.snapshots();
        try {
            this.engine.restore(data.pool);
            this.tokenA.restore(data.tokenA);
            this.tokenB.restore(data.tokenB);
        } catch (error) {
            this.engine.restore(previous.pool);
            this.tokenA.restore(previous.tokenA);
            this.tokenB.restore(previous.tokenB);
            throw error;
        }
        return true;
    }

    save(): void {
        if (!this.storage) return;
        this.storage.save(this.snapshots());
    }

    private snapshots(): Omit<PoolStateFile, 'version' | 'updatedAt'> {
        return {
            pool: this.engine.snapshot(),
            tokenA: this.tokenA.snapshot(),
            tokenB: this.tokenB.snapshot(),
        };
    }

    // ========== OPERATIONS ==========

    addLiquidity(provider: string, amountA: bigint, amountB: bigint): LiquidityAddedResult {
        this.requireOutsideParty(provider, 'provider');
        const result = this.engine.provideLiquidity(amountA, amountB, provider);
        this.save();
        return result;
    }

    removeLiquidity(provider: string, shares: bigint): LiquidityRemovedResult {
        this.requireOutsideParty(provider, 'provider');
        const result = this.engine.removeLiquidity(shares, provider);
        this.save();
        return result;
    }

    swap(from: Side, amountIn: bigint, caller: string): SwapResult {
        this.requireOutsideParty(caller, 'caller');
        const result = from === 'A'
            ? this.engine.swapAForB(amountIn, caller)
            : this.engine.swapBForA(amountIn, caller);
        this.save();
        return result;
    }

    quote(from: Side, amountIn: bigint): SwapQuote {
        return this.engine.quote(from === 'A' ? 'AtoB' : 'BtoA', amountIn);
    }

    /**
     * Credit test balances of both tokens
     */
    faucet(address: string, amount: bigint = this.faucetAmount): Balances {
        this.requireOutsideParty(address, 'address');
        this.tokenA.mint(address, amount);
        this.tokenB.mint(address, amount);
        this.save();
        log.info(`💧 Faucet: ${amount} ${this.tokenA.symbol} + ${amount} ${this.tokenB.symbol} → ${address}`);
        return this.balances(address);
    }

    // ========== QUERIES ==========

    info(): PoolInfo {
        return this.engine.getPoolInfo();
    }

    shareOf(provider: string): { provider: string; shares: bigint; totalShares: bigint } {
        return {
            provider,
            shares: this.engine.shareOf(provider),
            totalShares: this.engine.totalShares(),
        };
    }

    balances(address: string): Balances {
        return {
            address,
            tokenA: this.tokenA.balanceOf(address),
            tokenB: this.tokenB.balanceOf(address),
            shares: this.engine.shareOf(address),
        };
    }

    symbol(side: Side): string {
        return side === 'A' ? this.tokenA.symbol : this.tokenB.symbol;
    }

    /**
     * The pool account holds the reserves; it can never trade or provide
     */
    private requireOutsideParty(id: string, field: string): void {
        if (id === this.tokenA.poolAccount || id === this.tokenB.poolAccount) {
            throw new InputValidationError(field, `${field} cannot be the pool account`);
        }
    }
}
