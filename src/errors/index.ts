import { ErrorCode, ErrorCodes } from './codes';

export { ErrorCodes, type ErrorCode } from './codes';

/**
 * Base error for every rejected transaction.
 */
export class SupplyChainError extends Error {
    public readonly code: ErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
        super(`[${code}] ${message}`);
        this.name = 'SupplyChainError';
        this.code = code;
        this.details = details;
    }

    toJSON() {
        return {
            error: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
        };
    }
}

/** Caller lacks the role, or is not the party the operation names. */
export class UnauthorizedError extends SupplyChainError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ErrorCodes.UNAUTHORIZED, message, details);
        this.name = 'UnauthorizedError';
    }
}

/** Caller holds the role but has not been verified by an admin. */
export class NotVerifiedError extends SupplyChainError {
    constructor(principal: string) {
        super(ErrorCodes.NOT_VERIFIED, `Caller ${principal} is not verified`, { principal });
        this.name = 'NotVerifiedError';
    }
}

export class NotFoundError extends SupplyChainError {
    constructor(resource: string, identifier: string | number) {
        super(ErrorCodes.NOT_FOUND, `${resource} ${identifier} does not exist`, {
            resource,
            identifier: String(identifier),
        });
        this.name = 'NotFoundError';
    }
}

export class InvalidStateError extends SupplyChainError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ErrorCodes.INVALID_STATE, message, details);
        this.name = 'InvalidStateError';
    }
}

export class InsufficientFundsError extends SupplyChainError {
    constructor(principal: string, balance: number, required: number) {
        super(
            ErrorCodes.INSUFFICIENT_FUNDS,
            `Insufficient balance. Required: ${required}, Available: ${balance}`,
            { principal, balance, required }
        );
        this.name = 'InsufficientFundsError';
    }
}

export class TransferFailedError extends SupplyChainError {
    constructor(from: string, to: string, amount: number) {
        super(ErrorCodes.TRANSFER_FAILED, `Ledger transfer of ${amount} was rejected`, { from, to, amount });
        this.name = 'TransferFailedError';
    }
}

/** Malformed transaction argument. */
export class ValidationError extends SupplyChainError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ErrorCodes.VALIDATION_FAILED, message, details);
        this.name = 'ValidationError';
    }
}

/** A write would break a record invariant. Indicates a bug, not bad input. */
export class InternalError extends SupplyChainError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(ErrorCodes.INTERNAL_ERROR, message, details);
        this.name = 'InternalError';
    }
}

export function isSupplyChainError(error: unknown): error is SupplyChainError {
    return error instanceof SupplyChainError;
}
