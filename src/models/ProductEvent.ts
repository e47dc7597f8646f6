import { isRecord } from '../state/WorldState';

export enum ProductEventType {
    PRODUCT_CREATED = 'ProductCreated',
    PAYMENT_TRANSFERRED = 'PaymentTransferred',
    PRODUCT_SHIPPED = 'ProductShipped',
    PRODUCT_RECEIVED = 'ProductReceived',
    DISPUTE_RAISED = 'DisputeRaised',
    DISPUTE_RESOLVED = 'DisputeResolved'
}

export interface ProductEventPayloads {
    [ProductEventType.PRODUCT_CREATED]: { producer: string; name: string; origin: string; price: number };
    [ProductEventType.PAYMENT_TRANSFERRED]: { payer: string; payee: string; amount: number };
    [ProductEventType.PRODUCT_SHIPPED]: { shipper: string; location: string };
    [ProductEventType.PRODUCT_RECEIVED]: { buyer: string };
    [ProductEventType.DISPUTE_RAISED]: { raisedBy: string };
    [ProductEventType.DISPUTE_RESOLVED]: { resolvedBy: string };
}

export type ProductEventOf<T extends ProductEventType> = {
    seq: number;            // 1-based position in the event log
    docType: 'event';
    type: T;
    productId: number;
    txId: string;
    timestamp: string;
    payload: ProductEventPayloads[T];
};

export type ProductEvent = { [T in ProductEventType]: ProductEventOf<T> }[ProductEventType];

const EVENT_TYPES: readonly string[] = Object.values(ProductEventType);

export function isProductEvent(value: unknown): value is ProductEvent {
    if (!isRecord(value)) return false;
    return (
        value.docType === 'event' &&
        typeof value.seq === 'number' &&
        typeof value.type === 'string' &&
        EVENT_TYPES.includes(value.type) &&
        typeof value.productId === 'number' &&
        typeof value.txId === 'string' &&
        typeof value.timestamp === 'string' &&
        isRecord(value.payload)
    );
}
