import { Info, Transaction } from 'fabric-contract-api';
import { InsufficientFundsError, TransferFailedError } from '../errors';
import { parseWholeNumber, requireRole, requireText } from '../lifecycle/guards';
import { Role } from '../models/Participant';
import { BaseContract } from './BaseContract';
import { SupplyChainContext } from './SupplyChainContext';

@Info({ title: 'TokenContract', description: 'Settlement token balances' })
export class TokenContract extends BaseContract {

    constructor() {
        super('token');
    }

    @Transaction()
    async Mint(ctx: SupplyChainContext, recipient: string, amount: string): Promise<number> {
        return this.logged(ctx, 'Mint', async () => {
            await requireRole(ctx.registry, ctx.callerId(), Role.ADMIN);
            const to = requireText(recipient, 'recipient');
            return ctx.ledger.mint(to, parseWholeNumber(amount, 'amount'));
        });
    }

    @Transaction()
    async Transfer(ctx: SupplyChainContext, recipient: string, amount: string): Promise<void> {
        await this.logged(ctx, 'Transfer', async () => {
            const from = ctx.callerId();
            const to = requireText(recipient, 'recipient');
            const value = parseWholeNumber(amount, 'amount');

            const balance = await ctx.ledger.balanceOf(from);
            if (balance < value) throw new InsufficientFundsError(from, balance, value);
            if (!(await ctx.ledger.transfer(from, to, value))) throw new TransferFailedError(from, to, value);
        });
    }

    @Transaction(false)
    async BalanceOf(ctx: SupplyChainContext, owner: string): Promise<number> {
        return ctx.ledger.balanceOf(requireText(owner, 'owner'));
    }

    @Transaction(false)
    async ClientAccountBalance(ctx: SupplyChainContext): Promise<number> {
        return ctx.ledger.balanceOf(ctx.callerId());
    }
}
