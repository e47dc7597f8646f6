import {
    InsufficientFundsError,
    InvalidStateError,
    NotFoundError,
    TransferFailedError,
    UnauthorizedError,
    ValidationError,
} from '../errors';
import { EventLog } from '../events/EventLog';
import { Logger } from '../logging';
import { Product } from '../models/Product';
import { ProductEventType } from '../models/ProductEvent';
import { Role } from '../models/Participant';
import { RoleRegistry } from '../registry/RoleRegistry';
import { ProductStore } from '../store/ProductStore';
import { TokenLedger } from '../token/TokenLedger';
import { KeyedLock } from './KeyedLock';
import { requireRole, requireText, requireVerifiedRole } from './guards';

export interface LifecycleDeps {
    products: ProductStore;
    roles: RoleRegistry;
    ledger: TokenLedger;
    events: EventLog;
    logger: Logger;
    /** Defaults to a lock shared by every engine in the process. */
    locks?: KeyedLock;
}

const sharedLocks = new KeyedLock();
const CREATE_LOCK_KEY = 'product:next-id';

const productLockKey = (id: number) => `product:${id}`;

/**
 * Guarded product transitions. Each one runs under the lock of the record it
 * touches, checks its guards in a fixed order, and only then writes the
 * record and appends exactly one event. A rejected transition writes nothing.
 *
 * Guard order, first failure wins:
 *  - createProduct:  producer role, verified, arguments
 *  - payForProduct:  exists, not received, not paid, balance, transfer
 *  - shipProduct:    shipper role, verified, location, exists, not received, paid, not disputed
 *  - receiveProduct: buyer role, verified, exists, not received, paid, not disputed
 *  - raiseDispute:   exists, caller is buyer or producer, not disputed
 *  - resolveDispute: admin role, exists, disputed
 *  - verifyUser:     admin role, principal
 */
export class LifecycleEngine {
    private readonly products: ProductStore;
    private readonly roles: RoleRegistry;
    private readonly ledger: TokenLedger;
    private readonly events: EventLog;
    private readonly logger: Logger;
    private readonly locks: KeyedLock;

    constructor(deps: LifecycleDeps) {
        this.products = deps.products;
        this.roles = deps.roles;
        this.ledger = deps.ledger;
        this.events = deps.events;
        this.logger = deps.logger;
        this.locks = deps.locks ?? sharedLocks;
    }

    async createProduct(caller: string, name: string, origin: string, price: number): Promise<Product> {
        return this.transition('createProduct', caller, CREATE_LOCK_KEY, async () => {
            await requireVerifiedRole(this.roles, caller, Role.PRODUCER);
            const productName = requireText(name, 'name');
            const productOrigin = requireText(origin, 'origin');
            if (!Number.isSafeInteger(price) || price < 0) {
                throw new ValidationError(`price must be a non-negative integer, got ${price}`, { price });
            }

            const product = await this.products.create({
                name: productName,
                origin: productOrigin,
                producer: caller,
                shipper: null,
                buyer: null,
                location: productOrigin,
                price,
                isPaid: false,
                isReceived: false,
                isDisputed: false,
            });
            await this.events.append(ProductEventType.PRODUCT_CREATED, product.id, {
                producer: caller,
                name: product.name,
                origin: product.origin,
                price,
            });
            return product;
        });
    }

    /**
     * Open to any principal: whoever pays need not be the eventual buyer.
     */
    async payForProduct(caller: string, id: number): Promise<Product> {
        return this.transition('payForProduct', caller, productLockKey(id), async () => {
            const product = await this.load(id);
            if (product.isReceived) throw new InvalidStateError(`Product ${id} has already been received`, { productId: id });
            if (product.isPaid) throw new InvalidStateError(`Product ${id} is already paid`, { productId: id });

            const balance = await this.ledger.balanceOf(caller);
            if (balance < product.price) throw new InsufficientFundsError(caller, balance, product.price);

            const transferred = await this.ledger.transfer(caller, product.producer, product.price);
            if (!transferred) throw new TransferFailedError(caller, product.producer, product.price);

            const paid: Product = { ...product, isPaid: true };
            await this.products.put(paid);
            await this.events.append(ProductEventType.PAYMENT_TRANSFERRED, id, {
                payer: caller,
                payee: product.producer,
                amount: product.price,
            });
            return paid;
        });
    }

    async shipProduct(caller: string, id: number, location: string): Promise<Product> {
        return this.transition('shipProduct', caller, productLockKey(id), async () => {
            await requireVerifiedRole(this.roles, caller, Role.SHIPPER);
            const destination = requireText(location, 'location');
            const product = await this.load(id);
            this.requireDeliverable(product);

            const shipped: Product = { ...product, shipper: caller, location: destination };
            await this.products.put(shipped);
            await this.events.append(ProductEventType.PRODUCT_SHIPPED, id, { shipper: caller, location: destination });
            return shipped;
        });
    }

    async receiveProduct(caller: string, id: number): Promise<Product> {
        return this.transition('receiveProduct', caller, productLockKey(id), async () => {
            await requireVerifiedRole(this.roles, caller, Role.BUYER);
            const product = await this.load(id);
            this.requireDeliverable(product);

            const received: Product = { ...product, buyer: caller, isReceived: true };
            await this.products.put(received);
            await this.events.append(ProductEventType.PRODUCT_RECEIVED, id, { buyer: caller });
            return received;
        });
    }

    /**
     * Only the producer or the bound buyer may raise a dispute. The buyer is
     * bound at receipt, so before receipt only the producer qualifies.
     */
    async raiseDispute(caller: string, id: number): Promise<Product> {
        return this.transition('raiseDispute', caller, productLockKey(id), async () => {
            const product = await this.load(id);
            if (caller !== product.producer && caller !== product.buyer) {
                throw new UnauthorizedError(`Only the producer or buyer of product ${id} may raise a dispute`, {
                    productId: id,
                    principal: caller,
                });
            }
            if (product.isDisputed) throw new InvalidStateError(`Product ${id} is already disputed`, { productId: id });

            const disputed: Product = { ...product, isDisputed: true };
            await this.products.put(disputed);
            await this.events.append(ProductEventType.DISPUTE_RAISED, id, { raisedBy: caller });
            return disputed;
        });
    }

    async resolveDispute(caller: string, id: number): Promise<Product> {
        return this.transition('resolveDispute', caller, productLockKey(id), async () => {
            await requireRole(this.roles, caller, Role.ADMIN);
            const product = await this.load(id);
            if (!product.isDisputed) throw new InvalidStateError(`Product ${id} is not disputed`, { productId: id });

            const resolved: Product = { ...product, isDisputed: false };
            await this.products.put(resolved);
            await this.events.append(ProductEventType.DISPUTE_RESOLVED, id, { resolvedBy: caller });
            return resolved;
        });
    }

    /** The registry serializes writes to the participant record itself. */
    async verifyUser(caller: string, principal: string): Promise<void> {
        await requireRole(this.roles, caller, Role.ADMIN);
        const verified = requireText(principal, 'principal');
        await this.roles.markVerified(verified);
        this.logger.info({ operation: 'verifyUser', caller, principal: verified }, 'participant verified');
    }

    async getProduct(id: number): Promise<Product> {
        return this.load(id);
    }

    private async load(id: number): Promise<Product> {
        const product = await this.products.get(id);
        if (!product) throw new NotFoundError('Product', id);
        return product;
    }

    /** Shared by shipment and receipt. */
    private requireDeliverable(product: Product): void {
        const productId = product.id;
        if (product.isReceived) throw new InvalidStateError(`Product ${productId} has already been received`, { productId });
        if (!product.isPaid) throw new InvalidStateError(`Product ${productId} has not been paid for`, { productId });
        if (product.isDisputed) throw new InvalidStateError(`Product ${productId} is under dispute`, { productId });
    }

    // Rejections propagate unlogged; the contract layer logs them once per transaction.
    private async transition(
        operation: string,
        caller: string,
        lockKey: string,
        apply: () => Promise<Product>
    ): Promise<Product> {
        const product = await this.locks.run(lockKey, apply);
        this.logger.info({ operation, caller, productId: product.id }, 'transition applied');
        return product;
    }
}
