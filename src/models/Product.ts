import { InternalError } from '../errors';
import { isRecord } from '../state/WorldState';

export interface Product {
    id: number;
    docType: 'product';

    name: string;
    origin: string;
    producer: string;
    shipper: string | null;     // bound at shipment
    buyer: string | null;       // bound at receipt

    location: string;           // starts at origin, updated by the shipper
    price: number;              // ledger units

    isPaid: boolean;
    isReceived: boolean;
    isDisputed: boolean;
}

function isNullableString(value: unknown): value is string | null {
    return value === null || typeof value === 'string';
}

export function isProduct(value: unknown): value is Product {
    if (!isRecord(value)) return false;
    return (
        value.docType === 'product' &&
        typeof value.id === 'number' &&
        typeof value.name === 'string' &&
        typeof value.origin === 'string' &&
        typeof value.producer === 'string' &&
        isNullableString(value.shipper) &&
        isNullableString(value.buyer) &&
        typeof value.location === 'string' &&
        typeof value.price === 'number' &&
        typeof value.isPaid === 'boolean' &&
        typeof value.isReceived === 'boolean' &&
        typeof value.isDisputed === 'boolean'
    );
}

/**
 * Cross-field rules every stored product obeys, and the transitions allowed
 * from `previous` to `next`. Throws InternalError on the first violation.
 */
export function checkProductInvariants(next: Product, previous?: Product): void {
    const fail = (rule: string): never => {
        throw new InternalError(`Product ${next.id} violates invariant: ${rule}`, { productId: next.id, rule });
    };

    if (!Number.isSafeInteger(next.id) || next.id < 1) fail('id is a positive integer');
    if (next.producer.length === 0) fail('producer is set');
    if (!Number.isSafeInteger(next.price) || next.price < 0) fail('price is a non-negative integer');
    if (next.isReceived && !next.isPaid) fail('received implies paid');
    if ((next.buyer !== null) !== next.isReceived) fail('buyer is bound exactly when received');
    if (next.shipper !== null && !next.isPaid) fail('shipped implies paid');

    if (!previous) return;

    if (previous.id !== next.id) fail('id is immutable');
    if (previous.producer !== next.producer) fail('producer is immutable');
    if (previous.name !== next.name || previous.origin !== next.origin) fail('name and origin are immutable');
    if (previous.price !== next.price) fail('price is immutable');
    if (previous.isPaid && !next.isPaid) fail('payment never reverts');
    if (previous.isReceived && !next.isReceived) fail('receipt never reverts');
    if (previous.shipper !== null && next.shipper === null) fail('shipment never reverts');
}
