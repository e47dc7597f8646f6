import { Context } from 'fabric-contract-api';
import { ChaincodeConfig, loadConfig } from '../config';
import { EventLog } from '../events/EventLog';
import { LifecycleEngine } from '../lifecycle/LifecycleEngine';
import { createLogger, Logger } from '../logging';
import { WorldStateRoleRegistry } from '../registry/WorldStateRoleRegistry';
import { WorldState } from '../state/WorldState';
import { ProductStore } from '../store/ProductStore';
import { WorldStateTokenLedger } from '../token/WorldStateTokenLedger';

const config = loadConfig();
const chaincodeLogger = createLogger({ name: 'custody-chain', level: config.logLevel });

/**
 * Transaction context handed to every contract method. Collaborators are
 * built over this transaction's stub on first use.
 */
export class SupplyChainContext extends Context {
    private collaborators?: {
        registry: WorldStateRoleRegistry;
        ledger: WorldStateTokenLedger;
        products: ProductStore;
        events: EventLog;
        engine: LifecycleEngine;
    };

    worldState(): WorldState {
        return this.stub;
    }

    callerId(): string {
        return this.clientIdentity.getID();
    }

    callerMspId(): string {
        return this.clientIdentity.getMSPID();
    }

    logger(): Logger {
        return chaincodeLogger;
    }

    config(): ChaincodeConfig {
        return config;
    }

    get registry(): WorldStateRoleRegistry {
        return this.build().registry;
    }

    get ledger(): WorldStateTokenLedger {
        return this.build().ledger;
    }

    get products(): ProductStore {
        return this.build().products;
    }

    get events(): EventLog {
        return this.build().events;
    }

    get engine(): LifecycleEngine {
        return this.build().engine;
    }

    private build() {
        if (!this.collaborators) {
            const state = this.worldState();
            const registry = new WorldStateRoleRegistry(state);
            const ledger = new WorldStateTokenLedger(state);
            const products = new ProductStore(state);
            const events = new EventLog(state);
            const engine = new LifecycleEngine({
                products,
                roles: registry,
                ledger,
                events,
                logger: this.logger(),
            });
            this.collaborators = { registry, ledger, products, events, engine };
        }
        return this.collaborators;
    }
}
