import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { isLogThreshold, type LogThreshold } from '../protocol/utils/logger.js';

// Read version from package.json dynamically
function getPackageVersion(): string {
    try {
        const __filename = fileURLToPath(import.meta.url);
        const __dirname = dirname(__filename);
        const pkgPath = join(__dirname, '../../package.json');
        const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
            return pkg.version;
        }
        return '0.0.0';
    } catch {
        return '0.0.0';
    }
}

function envString(name: string, fallback: string): string {
    const value = process.env[name];
    return value !== undefined && value.trim() !== '' ? value.trim() : fallback;
}

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number.parseInt(raw, 10);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer, got "${raw}"`);
    }
    return value;
}

function envAmount(name: string, fallback: bigint): bigint {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    if (!/^\d+$/.test(raw.trim()) || BigInt(raw.trim()) === 0n) {
        throw new Error(`${name} must be a positive integer amount, got "${raw}"`);
    }
    return BigInt(raw.trim());
}

function envLogLevel(): LogThreshold {
    const raw = envString('LOG_LEVEL', 'info').toLowerCase();
    return isLogThreshold(raw) ? raw : 'info';
}

/**
 * Build the configuration from the current environment.
 * The CLI loads .env (dotenv) before this module is evaluated.
 */
export function loadConfig() {
    return {
        version: getPackageVersion(),
        logLevel: envLogLevel(),
        pool: {
            // Account id under which the in-memory ledgers hold pooled funds
            account: envString('POOL_ACCOUNT', 'pool'),
            symbolA: envString('TOKEN_A_SYMBOL', 'TKA'),
            symbolB: envString('TOKEN_B_SYMBOL', 'TKB'),
        },
        storage: {
            dataDir: envString('POOL_DATA_DIR', './data'),
            stateFile: envString('POOL_STATE_FILE', 'pool-state.json'),
        },
        api: {
            port: envInt('API_PORT', 3001),
            cors: {
                origin: envString('CORS_ORIGIN', '*'),
            },
            eventHistory: envInt('EVENT_HISTORY', 100),
        },
        faucet: {
            amount: envAmount('FAUCET_AMOUNT', 1_000_000n),
        },
    };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();
