import { InternalError } from '../errors';

/**
 * The part of the Fabric ChaincodeStub the stores depend on. A transaction
 * context's stub satisfies it directly; tests use MemoryWorldState.
 */
export interface WorldState {
    getState(key: string): Promise<Uint8Array>;
    putState(key: string, value: Uint8Array): Promise<void>;
    createCompositeKey(objectType: string, attributes: string[]): string;
    getStateByPartialCompositeKey(objectType: string, attributes: string[]): AsyncIterable<StateEntry>;
    setEvent(name: string, payload: Uint8Array): void;
    getTxID(): string;
    getDateTimestamp(): Date;
}

export interface StateEntry {
    key: string;
    value: Uint8Array;
}

export function encodeState(value: unknown): Uint8Array {
    return Buffer.from(JSON.stringify(value));
}

/**
 * Read and parse a JSON document. Returns undefined when the key was never
 * written (the stub returns an empty buffer for missing keys).
 */
export async function readJson(state: WorldState, key: string): Promise<unknown> {
    const data = await state.getState(key);
    if (!data || data.length === 0) return undefined;
    return decodeState(data);
}

export function decodeState(data: Uint8Array): unknown {
    return JSON.parse(Buffer.from(data).toString('utf8'));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Counters are stored as decimal strings. A missing key reads as 0; anything
 * else that is not a whole number is a corrupt record.
 */
export async function readCounter(state: WorldState, key: string): Promise<number> {
    const data = await state.getState(key);
    if (!data || data.length === 0) return 0;
    const raw = Buffer.from(data).toString('utf8');
    const value = Number(raw);
    if (!/^\d+$/.test(raw) || !Number.isSafeInteger(value)) {
        throw new InternalError(`Counter ${key} holds '${raw}', not a whole number`, { key });
    }
    return value;
}

export async function writeCounter(state: WorldState, key: string, value: number): Promise<void> {
    await state.putState(key, Buffer.from(String(value)));
}
