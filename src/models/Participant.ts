import { isRecord } from '../state/WorldState';

export enum Role {
    ADMIN = 'admin',
    PRODUCER = 'producer',
    SHIPPER = 'shipper',
    BUYER = 'buyer'
}

export interface Participant {
    id: string;             // x509 client identity, as returned by ClientIdentity.getID()
    docType: 'participant';
    roles: Role[];
    isVerified: boolean;    // set only by an admin
    verifiedAt?: string;
    createdAt: string;
}

const ROLES: readonly string[] = Object.values(Role);

export function isRole(value: unknown): value is Role {
    return typeof value === 'string' && ROLES.includes(value);
}

export function isParticipant(value: unknown): value is Participant {
    if (!isRecord(value)) return false;
    return (
        value.docType === 'participant' &&
        typeof value.id === 'string' &&
        Array.isArray(value.roles) &&
        value.roles.every(isRole) &&
        typeof value.isVerified === 'boolean' &&
        typeof value.createdAt === 'string'
    );
}
