import { Info, Transaction } from 'fabric-contract-api';
import { NotFoundError, UnauthorizedError, ValidationError } from '../errors';
import { requireRole, requireText } from '../lifecycle/guards';
import { isRole, Role } from '../models/Participant';
import { BaseContract } from './BaseContract';
import { SupplyChainContext } from './SupplyChainContext';

@Info({ title: 'AccessContract', description: 'Admin bootstrap, roles and verification' })
export class AccessContract extends BaseContract {

    constructor() {
        super('access');
    }

    @Transaction()
    async InitLedger(ctx: SupplyChainContext): Promise<string> {
        return this.logged(ctx, 'InitLedger', async () => {
            const client = this.getClient(ctx);
            const { adminMspId } = ctx.config();

            // Only the configured org may claim the first admin seat
            if (adminMspId && client.mspId !== adminMspId) {
                throw new UnauthorizedError(`MSP ${client.mspId} may not initialize the ledger`, { mspId: client.mspId });
            }

            const admin = await ctx.registry.bootstrapAdmin(client.id);
            return JSON.stringify(admin);
        });
    }

    @Transaction()
    async GrantRole(ctx: SupplyChainContext, principal: string, role: string): Promise<void> {
        await this.logged(ctx, 'GrantRole', async () => {
            const grantedRole = await this.authorizeRoleChange(ctx, role);
            await ctx.registry.grantRole(requireText(principal, 'principal'), grantedRole);
        });
    }

    @Transaction()
    async RevokeRole(ctx: SupplyChainContext, principal: string, role: string): Promise<void> {
        await this.logged(ctx, 'RevokeRole', async () => {
            const revokedRole = await this.authorizeRoleChange(ctx, role);
            await ctx.registry.revokeRole(requireText(principal, 'principal'), revokedRole);
        });
    }

    @Transaction()
    async VerifyUser(ctx: SupplyChainContext, principal: string): Promise<void> {
        await this.logged(ctx, 'VerifyUser', () => ctx.engine.verifyUser(ctx.callerId(), principal));
    }

    @Transaction(false)
    async GetParticipant(ctx: SupplyChainContext, principal: string): Promise<string> {
        const participant = await ctx.registry.getParticipant(principal);
        if (!participant) throw new NotFoundError('Participant', principal);
        return JSON.stringify(participant);
    }

    @Transaction(false)
    async ClientAccountID(ctx: SupplyChainContext): Promise<string> {
        return ctx.callerId();
    }

    private async authorizeRoleChange(ctx: SupplyChainContext, role: string): Promise<Role> {
        await requireRole(ctx.registry, ctx.callerId(), Role.ADMIN);
        if (!isRole(role)) {
            throw new ValidationError(`Unknown role '${role}'`, { role, allowed: Object.values(Role) });
        }
        return role;
    }
}
