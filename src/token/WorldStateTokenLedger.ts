import { ValidationError } from '../errors';
import { KeyedLock } from '../lifecycle/KeyedLock';
import { readCounter, WorldState, writeCounter } from '../state/WorldState';
import { TokenLedger } from './TokenLedger';

export function balanceKey(principal: string): string {
    return `BALANCE_${principal}`;
}

const ledgerLock = new KeyedLock();

export function assertAmount(amount: number): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
        throw new ValidationError(`Amount must be a non-negative integer, got ${amount}`, { amount });
    }
}

/**
 * Balances kept as decimal strings under BALANCE_<principal>.
 */
export class WorldStateTokenLedger implements TokenLedger {
    constructor(private readonly state: WorldState, private readonly lock: KeyedLock = ledgerLock) {}

    async balanceOf(principal: string): Promise<number> {
        return readCounter(this.state, balanceKey(principal));
    }

    async transfer(from: string, to: string, amount: number): Promise<boolean> {
        if (!Number.isSafeInteger(amount) || amount < 0) return false;

        // both accounts are held; transfers over disjoint accounts run independently
        return this.lock.runAll([balanceKey(from), balanceKey(to)], async () => {
            const fromBalance = await this.balanceOf(from);
            if (fromBalance < amount) return false;
            if (from === to || amount === 0) return true;

            const toBalance = await this.balanceOf(to);
            if (!Number.isSafeInteger(toBalance + amount)) return false;

            await writeCounter(this.state, balanceKey(from), fromBalance - amount);
            await writeCounter(this.state, balanceKey(to), toBalance + amount);
            return true;
        });
    }

    async mint(to: string, amount: number): Promise<number> {
        assertAmount(amount);
        return this.lock.run(balanceKey(to), async () => {
            const balance = await this.balanceOf(to);
            const next = balance + amount;
            if (!Number.isSafeInteger(next)) {
                throw new ValidationError(`Minting ${amount} overflows the balance of ${to}`, { to, amount });
            }
            await writeCounter(this.state, balanceKey(to), next);
            return next;
        });
    }
}
