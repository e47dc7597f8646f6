import { MemoryWorldState } from '../testing/MemoryWorldState';
import { rejectionCode } from '../testing/expectCode';
import { readCounter, writeCounter } from './WorldState';

describe('counters', () => {
    let state: MemoryWorldState;

    beforeEach(() => {
        state = new MemoryWorldState();
    });

    it('reads a missing counter as zero', async () => {
        expect(await readCounter(state, 'COUNTER_X')).toBe(0);
    });

    it('reads back what was written', async () => {
        await writeCounter(state, 'COUNTER_X', 41);
        expect(await readCounter(state, 'COUNTER_X')).toBe(41);
    });

    it.each(['-1', '1.5', 'abc', ' 7', '99999999999999999999'])('treats %j as a corrupt counter', async (raw) => {
        await state.putState('COUNTER_X', Buffer.from(raw));
        expect(await rejectionCode(readCounter(state, 'COUNTER_X'))).toBe('INTERNAL_ERROR');
    });
});

describe('MemoryWorldState composite keys', () => {
    it('lists only entries under the partial key, in key order', async () => {
        const state = new MemoryWorldState();
        const key = (...parts: string[]) => state.createCompositeKey('DOC', parts);
        await state.putState(key('b', '2'), Buffer.from('b2'));
        await state.putState(key('a', '1'), Buffer.from('a1'));
        await state.putState(key('b', '1'), Buffer.from('b1'));
        await state.putState(key('bb', '1'), Buffer.from('bb1'));
        await state.putState('DOC_b', Buffer.from('plain'));

        const values: string[] = [];
        for await (const { value } of state.getStateByPartialCompositeKey('DOC', ['b'])) {
            values.push(Buffer.from(value).toString('utf8'));
        }
        expect(values).toEqual(['b1', 'b2']);
    });
});
