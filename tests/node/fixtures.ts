import type { Config } from '../../src/node/config.js';

export function testConfig(): Config {
    return {
        version: '0.0.0-test',
        logLevel: 'silent',
        pool: { account: 'pool', symbolA: 'TKA', symbolB: 'TKB' },
        storage: { dataDir: './data', stateFile: 'pool-state.json' },
        api: { port: 0, cors: { origin: '*' }, eventHistory: 10 },
        faucet: { amount: 1_000_000n },
    };
}
