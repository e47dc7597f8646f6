import { EventLog } from '../events/EventLog';
import { LifecycleEngine } from '../lifecycle/LifecycleEngine';
import { KeyedLock } from '../lifecycle/KeyedLock';
import { createLogger, Logger } from '../logging';
import { Role } from '../models/Participant';
import { RoleRegistry } from '../registry/RoleRegistry';
import { WorldStateRoleRegistry } from '../registry/WorldStateRoleRegistry';
import { ProductStore } from '../store/ProductStore';
import { TokenLedger } from '../token/TokenLedger';
import { WorldStateTokenLedger } from '../token/WorldStateTokenLedger';
import { MemoryWorldState } from './MemoryWorldState';

export const ADMIN = 'x509::CN=admin';
export const PRODUCER = 'x509::CN=producer';
export const SHIPPER = 'x509::CN=shipper';
export const BUYER = 'x509::CN=buyer';
export const PAYER = 'x509::CN=payer';

export interface Harness {
    state: MemoryWorldState;
    registry: WorldStateRoleRegistry;
    ledger: WorldStateTokenLedger;
    products: ProductStore;
    events: EventLog;
    engine: LifecycleEngine;
}

export interface HarnessOptions {
    roles?: RoleRegistry;
    ledger?: TokenLedger;
    logger?: Logger;
}

/**
 * Engine over a fresh in-memory world state with its own lock, so tests do
 * not share lock state with each other.
 */
export function createHarness(options: HarnessOptions = {}): Harness {
    const state = new MemoryWorldState();
    const registry = new WorldStateRoleRegistry(state, new KeyedLock());
    const ledger = new WorldStateTokenLedger(state, new KeyedLock());
    const products = new ProductStore(state);
    const events = new EventLog(state, new KeyedLock());
    const engine = new LifecycleEngine({
        products,
        roles: options.roles ?? registry,
        ledger: options.ledger ?? ledger,
        events,
        logger: options.logger ?? createLogger({ name: 'test', level: 'silent' }),
        locks: new KeyedLock(),
    });
    return { state, registry, ledger, products, events, engine };
}

/** Admin plus one verified participant per custody role. */
export async function seedParticipants(registry: WorldStateRoleRegistry): Promise<void> {
    await registry.bootstrapAdmin(ADMIN);
    for (const [principal, role] of [
        [PRODUCER, Role.PRODUCER],
        [SHIPPER, Role.SHIPPER],
        [BUYER, Role.BUYER],
    ] as const) {
        await registry.grantRole(principal, role);
        await registry.markVerified(principal);
    }
}
