import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger.js';
import type { PoolSnapshot } from '../../runtime/pool/PoolEngine.js';
import type { TokenLedgerSnapshot } from '../../runtime/pool/custody.js';

const log = logger.child('Storage');

export const STATE_VERSION = 1;

export interface PoolStateFile {
    version: typeof STATE_VERSION;
    pool: PoolSnapshot;
    tokenA: TokenLedgerSnapshot;
    tokenB: TokenLedgerSnapshot;
    updatedAt: number;
}

export class PoolStorage {
    private readonly dataDir: string;
    private readonly statePath: string;

    constructor(dataDir: string, stateFile: string) {
        this.dataDir = dataDir;
        this.statePath = path.join(dataDir, stateFile);
    }

    getPath(): string {
        return this.statePath;
    }

    private ensureDirectory(): void {
        if (!fs.existsSync(this.dataDir)) {
            fs.mkdirSync(this.dataDir, { recursive: true });
        }
    }

    /**
     * Write through a temp file so a crash never leaves half a state file
     */
    save(data: Omit<PoolStateFile, 'version' | 'updatedAt'>): PoolStateFile {
        this.ensureDirectory();
        const file: PoolStateFile = { version: STATE_VERSION, ...data, updatedAt: Date.now() };
        const tmpPath = `${this.statePath}.tmp`;
        fs.writeFileSync(tmpPath, JSON.stringify(file, null, 2));
        fs.renameSync(tmpPath, this.statePath);
        log.debug(`💾 Pool state saved to ${this.statePath}`);
        return file;
    }

    /**
     * Returns null when nothing has been saved yet. A file that exists but
     * cannot be read as a state file is an error, never an empty pool.
     */
    load(): PoolStateFile | null {
        if (!fs.existsSync(this.statePath)) {
            return null;
        }
        const content = fs.readFileSync(this.statePath, 'utf-8');
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            throw new Error(`Pool state file ${this.statePath} is not valid JSON`, { cause: error });
        }
        if (!isPoolStateFile(parsed)) {
            throw new Error(`Pool state file ${this.statePath} has an unexpected shape`);
        }
        return parsed;
    }

    clear(): boolean {
        if (fs.existsSync(this.statePath)) {
            fs.unlinkSync(this.statePath);
            return true;
        }
        return false;
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
    return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

function isPoolSnapshot(value: unknown): value is PoolSnapshot {
    return isRecord(value)
        && typeof value.reserveA === 'string'
        && typeof value.reserveB === 'string'
        && typeof value.totalShares === 'string'
        && isStringMap(value.shares);
}

function isLedgerSnapshot(value: unknown): value is TokenLedgerSnapshot {
    return isRecord(value) && typeof value.symbol === 'string' && isStringMap(value.balances);
}

export function isPoolStateFile(value: unknown): value is PoolStateFile {
    return isRecord(value)
        && value.version === STATE_VERSION
        && isPoolSnapshot(value.pool)
        && isLedgerSnapshot(value.tokenA)
        && isLedgerSnapshot(value.tokenB)
        && typeof value.updatedAt === 'number';
}
