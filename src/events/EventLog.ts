import { InternalError } from '../errors';
import { isProductEvent, ProductEvent, ProductEventOf, ProductEventPayloads, ProductEventType } from '../models/ProductEvent';
import { KeyedLock } from '../lifecycle/KeyedLock';
import { decodeState, encodeState, readCounter, readJson, WorldState, writeCounter } from '../state/WorldState';

export const EVENT_OBJECT_TYPE = 'EVENT';
const EVENT_SEQ_OBJECT_TYPE = 'EVENT_SEQ';
const appendLock = new KeyedLock();

// zero padded so composite keys sort in numeric order
export function padKeyPart(value: number): string {
    return String(value).padStart(12, '0');
}

/**
 * Append-only audit trail kept per product. Records live under the composite
 * key EVENT/<productId>/<seq>, and each product has its own sequence, so
 * transitions on different products share no keys. Every append is also
 * published as the transaction's chaincode event; the order of blocks orders
 * events across products.
 */
export class EventLog {
    constructor(private readonly state: WorldState, private readonly lock: KeyedLock = appendLock) {}

    async append<T extends ProductEventType>(
        type: T,
        productId: number,
        payload: ProductEventPayloads[T]
    ): Promise<ProductEventOf<T>> {
        const seqKey = this.seqKey(productId);
        return this.lock.run(seqKey, () => this.write(seqKey, type, productId, payload));
    }

    private async write<T extends ProductEventType>(
        seqKey: string,
        type: T,
        productId: number,
        payload: ProductEventPayloads[T]
    ): Promise<ProductEventOf<T>> {
        const seq = (await readCounter(this.state, seqKey)) + 1;
        const event: ProductEventOf<T> = {
            seq,
            docType: 'event',
            type,
            productId,
            txId: this.state.getTxID(),
            timestamp: this.state.getDateTimestamp().toISOString(),
            payload,
        };
        const encoded = encodeState(event);

        await this.state.putState(this.eventKey(productId, seq), encoded);
        await writeCounter(this.state, seqKey, seq);
        this.state.setEvent(type, encoded);
        return event;
    }

    eventKey(productId: number, seq: number): string {
        return this.state.createCompositeKey(EVENT_OBJECT_TYPE, [padKeyPart(productId), padKeyPart(seq)]);
    }

    async get(productId: number, seq: number): Promise<ProductEvent | undefined> {
        const data = await readJson(this.state, this.eventKey(productId, seq));
        if (data === undefined) return undefined;
        if (!isProductEvent(data)) throw new InternalError(`Event record ${productId}/${seq} is malformed`, { productId, seq });
        return data;
    }

    /** Events of one product with seq >= fromSeq, oldest first, at most `limit` of them. */
    async list(productId: number, fromSeq: number, limit: number): Promise<ProductEvent[]> {
        const events: ProductEvent[] = [];
        if (limit <= 0) return events;

        const entries = this.state.getStateByPartialCompositeKey(EVENT_OBJECT_TYPE, [padKeyPart(productId)]);
        for await (const { key, value } of entries) {
            const event = decodeState(value);
            if (!isProductEvent(event)) throw new InternalError(`Event record ${JSON.stringify(key)} is malformed`, { productId });
            if (event.seq < fromSeq) continue;
            events.push(event);
            if (events.length >= limit) break;
        }
        return events;
    }

    async forProduct(productId: number): Promise<ProductEvent[]> {
        return this.list(productId, 1, Number.MAX_SAFE_INTEGER);
    }

    /** Number of events recorded for one product. */
    async length(productId: number): Promise<number> {
        return readCounter(this.state, this.seqKey(productId));
    }

    private seqKey(productId: number): string {
        return this.state.createCompositeKey(EVENT_SEQ_OBJECT_TYPE, [padKeyPart(productId)]);
    }
}
