import { Contract } from 'fabric-contract-api';
import { isSupplyChainError } from '../errors';
import { SupplyChainContext } from './SupplyChainContext';

export class BaseContract extends Contract {
    constructor(name: string) {
        super(name);
    }

    createContext(): SupplyChainContext {
        return new SupplyChainContext();
    }

    // Helper: Get Client Identity
    protected getClient(ctx: SupplyChainContext) {
        return {
            id: ctx.callerId(),
            mspId: ctx.callerMspId()
        };
    }

    // Helper: log a rejected transaction before it reaches the client
    protected async logged<T>(ctx: SupplyChainContext, operation: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            const logger = ctx.logger();
            if (isSupplyChainError(error)) {
                logger.warn({ contract: this.getName(), operation, code: error.code }, error.message);
            } else {
                logger.error({ contract: this.getName(), operation, err: error }, 'transaction failed');
            }
            throw error;
        }
    }
}
