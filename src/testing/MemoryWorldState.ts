import { StateEntry, WorldState } from '../state/WorldState';

export interface EmittedEvent {
    name: string;
    payload: string;
}

/**
 * In-process stand-in for the chaincode stub. Keys live in a Map; events
 * published with setEvent are kept in emission order.
 */
export class MemoryWorldState implements WorldState {
    private readonly entries = new Map<string, Uint8Array>();
    private readonly published: EmittedEvent[] = [];
    private txCounter = 0;

    constructor(private readonly clock: () => Date = () => new Date('2026-01-01T00:00:00.000Z')) {}

    async getState(key: string): Promise<Uint8Array> {
        await Promise.resolve();
        return this.entries.get(key) ?? new Uint8Array(0);
    }

    async putState(key: string, value: Uint8Array): Promise<void> {
        await Promise.resolve();
        this.entries.set(key, Uint8Array.from(value));
    }

    /** Same layout as the Fabric stub: a NUL-led object type, each attribute NUL-terminated. */
    createCompositeKey(objectType: string, attributes: string[]): string {
        return `\u0000${objectType}\u0000${attributes.map((attribute) => `${attribute}\u0000`).join('')}`;
    }

    async *getStateByPartialCompositeKey(objectType: string, attributes: string[]): AsyncGenerator<StateEntry> {
        const prefix = this.createCompositeKey(objectType, attributes);
        for (const key of this.keys()) {
            const value = this.entries.get(key);
            if (!key.startsWith(prefix) || value === undefined) continue;
            await Promise.resolve();
            yield { key, value: Uint8Array.from(value) };
        }
    }

    setEvent(name: string, payload: Uint8Array): void {
        this.published.push({ name, payload: Buffer.from(payload).toString('utf8') });
    }

    getTxID(): string {
        this.txCounter += 1;
        return `tx-${this.txCounter}`;
    }

    getDateTimestamp(): Date {
        return this.clock();
    }

    get events(): readonly EmittedEvent[] {
        return this.published;
    }

    keys(): string[] {
        return [...this.entries.keys()].sort();
    }
}
