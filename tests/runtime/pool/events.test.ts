import { describe, it, expect, beforeEach } from 'vitest';
import { PoolEventBus, serializeNotification, type PoolNotification } from '../../../src/runtime/pool/index.js';

const added: PoolNotification = { type: 'LiquidityAdded', provider: 'alice', amountA: 100n, amountB: 200n, sharesMinted: 141n };
const swapped: PoolNotification = { type: 'Swap', caller: 'bob', direction: 'AtoB', amountIn: 10n, amountOut: 18n };

describe('PoolEventBus', () => {
    let bus: PoolEventBus;
    beforeEach(() => { bus = new PoolEventBus(3); });

    it('records notifications with increasing sequence numbers', () => {
        bus.notify(added);
        bus.notify(swapped);
        const recent = bus.recent();
        expect(recent.map((entry) => entry.seq)).toEqual([1, 2]);
        expect(recent.map((entry) => entry.notification)).toEqual([added, swapped]);
    });

    it('keeps only the newest entries', () => {
        for (let i = 0; i < 5; i++) bus.notify(swapped);
        expect(bus.recent().map((entry) => entry.seq)).toEqual([3, 4, 5]);
    });

    it('recent(limit) returns the tail', () => {
        bus.notify(added);
        bus.notify(swapped);
        expect(bus.recent(1).map((entry) => entry.notification.type)).toEqual(['Swap']);
        expect(bus.recent(0)).toEqual([]);
    });

    it('typed listeners only see their type, before catch-all listeners', () => {
        const order: string[] = [];
        bus.onAny((n) => order.push(`any:${n.type}`));
        bus.on('Swap', (n) => order.push(`swap:${n.amountOut}`));

        bus.notify(added);
        bus.notify(swapped);
        expect(order).toEqual(['any:LiquidityAdded', 'swap:18', 'any:Swap']);
    });

    it('unsubscribe stops delivery', () => {
        const seen: string[] = [];
        const off = bus.on('LiquidityAdded', (n) => seen.push(n.provider));
        bus.notify(added);
        off();
        bus.notify(added);
        expect(seen).toEqual(['alice']);
    });
});

describe('serializeNotification', () => {
    it('turns bigints into decimal strings', () => {
        expect(serializeNotification(swapped)).toEqual({
            type: 'Swap',
            caller: 'bob',
            direction: 'AtoB',
            amountIn: '10',
            amountOut: '18',
        });
    });
});
