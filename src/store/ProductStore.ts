import { InternalError } from '../errors';
import { checkProductInvariants, isProduct, Product } from '../models/Product';
import { encodeState, readCounter, readJson, WorldState, writeCounter } from '../state/WorldState';

const PRODUCT_COUNTER_KEY = 'COUNTER_PRODUCT';

export function productKey(id: number): string {
    return `PRODUCT_${id}`;
}

export type NewProduct = Omit<Product, 'id' | 'docType'>;

/**
 * Product records keyed by sequential id. Records are never deleted; every
 * write goes through the invariant check.
 */
export class ProductStore {
    constructor(private readonly state: WorldState) {}

    async create(fields: NewProduct): Promise<Product> {
        const id = (await readCounter(this.state, PRODUCT_COUNTER_KEY)) + 1;
        const product: Product = { id, docType: 'product', ...fields };
        checkProductInvariants(product);

        await this.state.putState(productKey(id), encodeState(product));
        await writeCounter(this.state, PRODUCT_COUNTER_KEY, id);
        return product;
    }

    async get(id: number): Promise<Product | undefined> {
        const data = await readJson(this.state, productKey(id));
        if (data === undefined) return undefined;
        if (!isProduct(data)) throw new InternalError(`Product record ${id} is malformed`, { productId: id });
        return data;
    }

    async put(product: Product): Promise<void> {
        const previous = await this.get(product.id);
        if (!previous) throw new InternalError(`Product ${product.id} cannot be overwritten before it is created`);
        checkProductInvariants(product, previous);
        await this.state.putState(productKey(product.id), encodeState(product));
    }

    async count(): Promise<number> {
        return readCounter(this.state, PRODUCT_COUNTER_KEY);
    }
}
