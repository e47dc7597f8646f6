export interface ChaincodeConfig {
    logLevel: string;
    /** MSP allowed to bootstrap the first admin; any MSP when unset. */
    adminMspId?: string;
    maxEventPage: number;
}

const DEFAULT_MAX_EVENT_PAGE = 100;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const value = parseInt(raw, 10);
    return Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

/**
 * Load chaincode settings from the environment of the chaincode container
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChaincodeConfig {
    return {
        logLevel: env.LOG_LEVEL || 'info',
        adminMspId: env.SUPPLY_CHAIN_ADMIN_MSP || undefined,
        maxEventPage: parsePositiveInt(env.SUPPLY_CHAIN_MAX_EVENT_PAGE, DEFAULT_MAX_EVENT_PAGE),
    };
}
