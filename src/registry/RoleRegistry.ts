import { Role } from '../models/Participant';

/**
 * Role membership and verification, queried fresh on every transition.
 * Gating who may call markVerified is the caller's job, not the registry's.
 */
export interface RoleRegistry {
    hasRole(principal: string, role: Role): Promise<boolean>;
    isVerified(principal: string): Promise<boolean>;
    markVerified(principal: string): Promise<void>;
}
