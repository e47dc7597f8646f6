import { Role } from '../models/Participant';
import { RoleRegistry } from '../registry/RoleRegistry';
import { rejectionCode } from '../testing/expectCode';
import { parseWholeNumber, requireText, requireVerifiedRole } from './guards';

function registry(roles: Role[], verified: boolean): RoleRegistry {
    return {
        hasRole: async (_principal, role) => roles.includes(role),
        isVerified: async () => verified,
        markVerified: async () => undefined,
    };
}

describe('requireVerifiedRole', () => {
    it('reports the missing role before missing verification', async () => {
        expect(await rejectionCode(requireVerifiedRole(registry([], false), 'p', Role.SHIPPER))).toBe('UNAUTHORIZED');
        expect(await rejectionCode(requireVerifiedRole(registry([], true), 'p', Role.SHIPPER))).toBe('UNAUTHORIZED');
        expect(await rejectionCode(requireVerifiedRole(registry([Role.SHIPPER], false), 'p', Role.SHIPPER))).toBe('NOT_VERIFIED');
        expect(await rejectionCode(requireVerifiedRole(registry([Role.SHIPPER], true), 'p', Role.SHIPPER))).toBe('RESOLVED');
    });
});

describe('argument parsing', () => {
    it('trims text and rejects blanks', () => {
        expect(requireText('  Port-X ', 'location')).toBe('Port-X');
        expect(() => requireText('   ', 'location')).toThrow('[VALIDATION_FAILED] location must not be empty');
    });

    it('accepts only plain non-negative integers', () => {
        expect(parseWholeNumber('042', 'price')).toBe(42);
        expect(parseWholeNumber(' 7 ', 'price')).toBe(7);
        expect(() => parseWholeNumber('-3', 'price')).toThrow("[VALIDATION_FAILED] price must be a non-negative integer, got '-3'");
        expect(() => parseWholeNumber('9007199254740993', 'price')).toThrow('[VALIDATION_FAILED] price is out of range');
    });
});
