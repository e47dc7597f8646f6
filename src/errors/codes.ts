/**
 * Rejection codes surfaced to chaincode clients. The code is carried on the
 * thrown error and prefixed to its message, which is all a Fabric client sees.
 */
export const ErrorCodes = {
    UNAUTHORIZED: 'UNAUTHORIZED',
    NOT_VERIFIED: 'NOT_VERIFIED',
    NOT_FOUND: 'NOT_FOUND',
    INVALID_STATE: 'INVALID_STATE',
    INSUFFICIENT_FUNDS: 'INSUFFICIENT_FUNDS',
    TRANSFER_FAILED: 'TRANSFER_FAILED',
    VALIDATION_FAILED: 'VALIDATION_FAILED',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
