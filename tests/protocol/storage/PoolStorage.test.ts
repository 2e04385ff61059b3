import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { PoolStorage, STATE_VERSION } from '../../../src/protocol/storage/index.js';

const data = {
    pool: { reserveA: '100', reserveB: '200', totalShares: '141', shares: { alice: '141' } },
    tokenA: { symbol: 'TKA', balances: { alice: '999900', pool: '100' } },
    tokenB: { symbol: 'TKB', balances: { alice: '999800', pool: '200' } },
};

describe('PoolStorage', () => {
    let dir: string;
    let storage: PoolStorage;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pairswap-storage-'));
        storage = new PoolStorage(path.join(dir, 'nested'), 'pool.json');
    });
    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('load returns null before anything is saved', () => {
        expect(storage.load()).toBeNull();
    });

    it('save creates the directory and load reads it back', () => {
        const saved = storage.save(data);
        expect(saved.version).toBe(STATE_VERSION);
        expect(fs.existsSync(storage.getPath())).toBe(true);
        expect(fs.existsSync(`${storage.getPath()}.tmp`)).toBe(false);
        expect(storage.load()).toEqual(saved);
    });

    it('throws on a file that is not JSON', () => {
        storage.save(data);
        fs.writeFileSync(storage.getPath(), '{ not json');
        expect(() => storage.load()).toThrow('is not valid JSON');
    });

    it('throws on a file with the wrong shape', () => {
        storage.save(data);
        fs.writeFileSync(storage.getPath(), JSON.stringify({ version: 2, pool: data.pool }));
        expect(() => storage.load()).toThrow('unexpected shape');
    });

    it('clear removes the file once', () => {
        storage.save(data);
        expect(storage.clear()).toBe(true);
        expect(storage.clear()).toBe(false);
        expect(storage.load()).toBeNull();
    });
});
