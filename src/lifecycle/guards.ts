import { NotVerifiedError, UnauthorizedError, ValidationError } from '../errors';
import { Role } from '../models/Participant';
import { RoleRegistry } from '../registry/RoleRegistry';

/** Role first, so a principal without the role always sees UNAUTHORIZED. */
export async function requireRole(roles: RoleRegistry, principal: string, role: Role): Promise<void> {
    if (!(await roles.hasRole(principal, role))) {
        throw new UnauthorizedError(`Caller ${principal} does not hold the ${role} role`, { principal, role });
    }
}

/**
 * Role, then verification. An unverified holder of the role gets
 * NOT_VERIFIED; anyone without the role gets UNAUTHORIZED whatever their
 * verification status.
 */
export async function requireVerifiedRole(roles: RoleRegistry, principal: string, role: Role): Promise<void> {
    await requireRole(roles, principal, role);
    if (!(await roles.isVerified(principal))) throw new NotVerifiedError(principal);
}

export function requireText(value: string, field: string): string {
    const trimmed = typeof value === 'string' ? value.trim() : '';
    if (trimmed.length === 0) throw new ValidationError(`${field} must not be empty`, { field });
    return trimmed;
}

/** Parse a decimal transaction argument into a non-negative safe integer. */
export function parseWholeNumber(raw: string, field: string): number {
    const text = typeof raw === 'string' ? raw.trim() : '';
    if (!/^\d+$/.test(text)) throw new ValidationError(`${field} must be a non-negative integer, got '${raw}'`, { field });
    const value = Number(text);
    if (!Number.isSafeInteger(value)) throw new ValidationError(`${field} is out of range`, { field });
    return value;
}
