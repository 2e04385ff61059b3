/**
 * Custody
 *
 * The pool never moves balances itself. Each asset has a CustodyAccount the
 * engine asks to pull funds in and push funds out. A transfer either fully
 * happens and returns true, or has no effect and returns false (or throws).
 *
 * TokenLedger is the in-memory implementation used by the CLI, the API and
 * the tests. It is a stand-in for a real token, not a bridge to one.
 */

import { logger } from '../../protocol/utils/logger.js';

const log = logger.child('Custody');

export interface CustodyAccount {
    /** Asset symbol, for logs and notifications */
    readonly symbol: string;
    /** Move `amount` from `who` into the pool */
    pullFrom(who: string, amount: bigint): boolean;
    /** Move `amount` from the pool to `who` */
    pushTo(who: string, amount: bigint): boolean;
}

export interface TokenLedgerSnapshot {
    symbol: string;
    balances: Record<string, string>;
}

export class TokenLedger implements CustodyAccount {
    private balances: Map<string, bigint> = new Map();

    constructor(
        public readonly symbol: string,
        public readonly poolAccount: string,
    ) {}

    balanceOf(address: string): bigint {
        return this.balances.get(address) ?? 0n;
    }

    /**
     * Credit test funds to an address
     */
    mint(address: string, amount: bigint): bigint {
        if (amount <= 0n) {
            throw new RangeError('Mint amount must be positive');
        }
        const balance = this.balanceOf(address) + amount;
        this.balances.set(address, balance);
        log.debug(`💧 Minted ${amount} ${this.symbol} → ${address}`);
        return balance;
    }

    pullFrom(who: string, amount: bigint): boolean {
        return this.transfer(who, this.poolAccount, amount);
    }

    pushTo(who: string, amount: bigint): boolean {
        return this.transfer(this.poolAccount, who, amount);
    }

    private transfer(from: string, to: string, amount: bigint): boolean {
        // A self-transfer would move nothing while reporting success
        if (amount <= 0n || from === to) return false;

        const fromBalance = this.balanceOf(from);
        if (fromBalance < amount) {
            log.debug(`Transfer of ${amount} ${this.symbol} from ${from} refused: balance ${fromBalance}`);
            return false;
        }

        this.setBalance(from, fromBalance - amount);
        this.setBalance(to, this.balanceOf(to) + amount);
        return true;
    }

    private setBalance(address: string, balance: bigint): void {
        if (balance === 0n) {
            this.balances.delete(address);
        } else {
            this.balances.set(address, balance);
        }
    }

    holders(): number {
        return this.balances.size;
    }

    // ========== SERIALIZATION ==========

    snapshot(): TokenLedgerSnapshot {
        return {
            symbol: this.symbol,
            balances: Object.fromEntries(
                Array.from(this.balances.entries()).map(([address, balance]) => [address, balance.toString()])
            ),
        };
    }

    restore(data: TokenLedgerSnapshot): void {
        if (data.symbol !== this.symbol) {
            throw new Error(`Ledger snapshot is for ${data.symbol}, expected ${this.symbol}`);
        }
        const next = new Map<string, bigint>();
        for (const [address, raw] of Object.entries(data.balances)) {
            if (!/^\d+$/.test(raw)) {
                throw new Error(`Invalid ${this.symbol} balance for ${address}: ${raw}`);
            }
            const balance = BigInt(raw);
            if (balance > 0n) next.set(address, balance);
        }
        this.balances = next;
    }
}
