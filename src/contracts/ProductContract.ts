import { Info, Transaction } from 'fabric-contract-api';
import { parseWholeNumber } from '../lifecycle/guards';
import { BaseContract } from './BaseContract';
import { SupplyChainContext } from './SupplyChainContext';

@Info({ title: 'ProductContract', description: 'Product custody lifecycle and audit trail' })
export class ProductContract extends BaseContract {

    constructor() {
        super('product');
    }

    @Transaction()
    async CreateProduct(ctx: SupplyChainContext, name: string, origin: string, price: string): Promise<string> {
        return this.logged(ctx, 'CreateProduct', async () => {
            const product = await ctx.engine.createProduct(ctx.callerId(), name, origin, parseWholeNumber(price, 'price'));
            return JSON.stringify(product);
        });
    }

    @Transaction()
    async PayForProduct(ctx: SupplyChainContext, productId: string): Promise<string> {
        return this.logged(ctx, 'PayForProduct', async () => {
            const product = await ctx.engine.payForProduct(ctx.callerId(), parseWholeNumber(productId, 'productId'));
            return JSON.stringify(product);
        });
    }

    @Transaction()
    async ShipProduct(ctx: SupplyChainContext, productId: string, location: string): Promise<string> {
        return this.logged(ctx, 'ShipProduct', async () => {
            const id = parseWholeNumber(productId, 'productId');
            return JSON.stringify(await ctx.engine.shipProduct(ctx.callerId(), id, location));
        });
    }

    @Transaction()
    async ReceiveProduct(ctx: SupplyChainContext, productId: string): Promise<string> {
        return this.logged(ctx, 'ReceiveProduct', async () => {
            const product = await ctx.engine.receiveProduct(ctx.callerId(), parseWholeNumber(productId, 'productId'));
            return JSON.stringify(product);
        });
    }

    @Transaction()
    async RaiseDispute(ctx: SupplyChainContext, productId: string): Promise<string> {
        return this.logged(ctx, 'RaiseDispute', async () => {
            const product = await ctx.engine.raiseDispute(ctx.callerId(), parseWholeNumber(productId, 'productId'));
            return JSON.stringify(product);
        });
    }

    @Transaction()
    async ResolveDispute(ctx: SupplyChainContext, productId: string): Promise<string> {
        return this.logged(ctx, 'ResolveDispute', async () => {
            const product = await ctx.engine.resolveDispute(ctx.callerId(), parseWholeNumber(productId, 'productId'));
            return JSON.stringify(product);
        });
    }

    @Transaction(false)
    async ReadProduct(ctx: SupplyChainContext, productId: string): Promise<string> {
        return this.logged(ctx, 'ReadProduct', async () => {
            const product = await ctx.engine.getProduct(parseWholeNumber(productId, 'productId'));
            return JSON.stringify(product);
        });
    }

    @Transaction(false)
    async ProductExists(ctx: SupplyChainContext, productId: string): Promise<boolean> {
        return this.logged(ctx, 'ProductExists', async () => {
            const product = await ctx.products.get(parseWholeNumber(productId, 'productId'));
            return product !== undefined;
        });
    }

    @Transaction(false)
    async ProductCount(ctx: SupplyChainContext): Promise<number> {
        return ctx.products.count();
    }

    // --- Audit trail, readable by anyone ---
    @Transaction(false)
    async GetEvents(ctx: SupplyChainContext, productId: string, fromSeq: string, limit: string): Promise<string> {
        return this.logged(ctx, 'GetEvents', async () => {
            const id = parseWholeNumber(productId, 'productId');
            const start = Math.max(1, parseWholeNumber(fromSeq || '1', 'fromSeq'));
            const { maxEventPage } = ctx.config();
            const requested = limit ? parseWholeNumber(limit, 'limit') : maxEventPage;
            const pageSize = Math.min(Math.max(requested, 1), maxEventPage);
            return JSON.stringify(await ctx.events.list(id, start, pageSize));
        });
    }

    @Transaction(false)
    async GetProductHistory(ctx: SupplyChainContext, productId: string): Promise<string> {
        return this.logged(ctx, 'GetProductHistory', async () => {
            const product = await ctx.engine.getProduct(parseWholeNumber(productId, 'productId'));
            return JSON.stringify(await ctx.events.forProduct(product.id));
        });
    }
}
