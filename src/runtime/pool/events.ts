/**
 * Pool notifications
 *
 * Emitted only after an operation's state change and transfers are final.
 */

export type SwapDirection = 'AtoB' | 'BtoA';

export interface LiquidityAddedNotification {
    type: 'LiquidityAdded';
    provider: string;
    amountA: bigint;
    amountB: bigint;
    sharesMinted: bigint;
}

export interface LiquidityRemovedNotification {
    type: 'LiquidityRemoved';
    provider: string;
    sharesBurned: bigint;
    amountA: bigint;
    amountB: bigint;
}

export interface SwapNotification {
    type: 'Swap';
    caller: string;
    direction: SwapDirection;
    amountIn: bigint;
    amountOut: bigint;
}

export type PoolNotification =
    | LiquidityAddedNotification
    | LiquidityRemovedNotification
    | SwapNotification;

export type PoolNotificationType = PoolNotification['type'];

export interface NotificationSink {
    notify(notification: PoolNotification): void;
}

type Listener<N extends PoolNotification = PoolNotification> = (notification: N) => void;
type NotificationOf<T extends PoolNotificationType> = Extract<PoolNotification, { type: T }>;

export interface RecordedNotification {
    seq: number;
    at: number;
    notification: PoolNotification;
}

const DEFAULT_HISTORY = 100;

/**
 * In-process sink: typed subscriptions plus a bounded history
 */
export class PoolEventBus implements NotificationSink {
    private listeners: Map<PoolNotificationType | '*', Set<Listener>> = new Map();
    private history: RecordedNotification[] = [];
    private seq = 0;

    constructor(private readonly maxHistory: number = DEFAULT_HISTORY) {}

    notify(notification: PoolNotification): void {
        this.seq++;
        this.history.push({ seq: this.seq, at: Date.now(), notification });
        if (this.history.length > this.maxHistory) {
            this.history.splice(0, this.history.length - this.maxHistory);
        }

        for (const listener of this.listeners.get(notification.type) ?? []) listener(notification);
        for (const listener of this.listeners.get('*') ?? []) listener(notification);
    }

    /**
     * Subscribe to one notification type. Returns an unsubscribe function.
     */
    on<T extends PoolNotificationType>(type: T, listener: Listener<NotificationOf<T>>): () => void {
        const wrapped: Listener = (notification) => {
            if (isNotificationOf(notification, type)) listener(notification);
        };
        return this.add(type, wrapped);
    }

    onAny(listener: Listener): () => void {
        return this.add('*', listener);
    }

    recent(limit: number = this.maxHistory): RecordedNotification[] {
        if (limit <= 0) return [];
        return this.history.slice(-limit);
    }

    private add(key: PoolNotificationType | '*', listener: Listener): () => void {
        let set = this.listeners.get(key);
        if (!set) {
            set = new Set();
            this.listeners.set(key, set);
        }
        set.add(listener);
        return () => {
            set?.delete(listener);
        };
    }
}

function isNotificationOf<T extends PoolNotificationType>(
    notification: PoolNotification,
    type: T
): notification is NotificationOf<T> {
    return notification.type === type;
}

/**
 * JSON-friendly form (bigints as decimal strings)
 */
export function serializeNotification(notification: PoolNotification): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(notification)) {
        out[key] = typeof value === 'bigint' ? value.toString() : String(value);
    }
    return out;
}
