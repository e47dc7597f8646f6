import { InternalError, InvalidStateError } from '../errors';
import { KeyedLock } from '../lifecycle/KeyedLock';
import { isParticipant, Participant, Role } from '../models/Participant';
import { encodeState, readJson, WorldState } from '../state/WorldState';
import { RoleRegistry } from './RoleRegistry';

const ADMIN_BOOTSTRAP_KEY = 'ADMIN_BOOTSTRAPPED';

const registryLock = new KeyedLock();

export function participantKey(principal: string): string {
    return `PARTICIPANT_${principal}`;
}

/**
 * Participants stored as world-state documents, one per principal.
 */
export class WorldStateRoleRegistry implements RoleRegistry {
    constructor(private readonly state: WorldState, private readonly lock: KeyedLock = registryLock) {}

    async getParticipant(principal: string): Promise<Participant | undefined> {
        const data = await readJson(this.state, participantKey(principal));
        if (data === undefined) return undefined;
        if (!isParticipant(data)) throw new InternalError(`Participant record for ${principal} is malformed`);
        return data;
    }

    async hasRole(principal: string, role: Role): Promise<boolean> {
        const participant = await this.getParticipant(principal);
        return participant !== undefined && participant.roles.includes(role);
    }

    async isVerified(principal: string): Promise<boolean> {
        const participant = await this.getParticipant(principal);
        return participant?.isVerified ?? false;
    }

    async markVerified(principal: string): Promise<void> {
        await this.lock.run(participantKey(principal), async () => {
            const participant = await this.loadOrNew(principal);
            if (participant.isVerified) return;
            participant.isVerified = true;
            participant.verifiedAt = this.now();
            await this.save(participant);
        });
    }

    async grantRole(principal: string, role: Role): Promise<void> {
        await this.lock.run(participantKey(principal), async () => {
            const participant = await this.loadOrNew(principal);
            if (participant.roles.includes(role)) return;
            participant.roles = [...participant.roles, role];
            await this.save(participant);
        });
    }

    async revokeRole(principal: string, role: Role): Promise<void> {
        await this.lock.run(participantKey(principal), async () => {
            const participant = await this.getParticipant(principal);
            if (!participant || !participant.roles.includes(role)) return;
            participant.roles = participant.roles.filter((r) => r !== role);
            await this.save(participant);
        });
    }

    /**
     * One-time admin bootstrap. The first admin is verified so it can act
     * immediately; later admins are granted through grantRole.
     */
    async bootstrapAdmin(principal: string): Promise<Participant> {
        return this.lock.run(ADMIN_BOOTSTRAP_KEY, async () => {
            const marker = await this.state.getState(ADMIN_BOOTSTRAP_KEY);
            if (marker && marker.length > 0) throw new InvalidStateError('Ledger is already initialized');

            await this.grantRole(principal, Role.ADMIN);
            await this.markVerified(principal);
            await this.state.putState(ADMIN_BOOTSTRAP_KEY, Buffer.from(principal));

            const admin = await this.getParticipant(principal);
            if (!admin) throw new InternalError(`Admin ${principal} was not stored`);
            return admin;
        });
    }

    private async loadOrNew(principal: string): Promise<Participant> {
        const existing = await this.getParticipant(principal);
        if (existing) return existing;
        return {
            id: principal,
            docType: 'participant',
            roles: [],
            isVerified: false,
            createdAt: this.now(),
        };
    }

    private async save(participant: Participant): Promise<void> {
        await this.state.putState(participantKey(participant.id), encodeState(participant));
    }

    private now(): string {
        return this.state.getDateTimestamp().toISOString();
    }
}
