import { describe, it, expect } from 'vitest';
import { DAY_START, makeEntry } from '../../__tests__/fixtures';
import { Priority } from '../../models/QueueEntry';
import { compareServiceKeys, isPriority, priorityRank, serviceKey } from '../priorityCalculator';

describe('priorityCalculator', () => {
    it('ranks NORMAL < URGENT < SUPER_URGENT', () => {
        expect(priorityRank(Priority.NORMAL)).toBe(0);
        expect(priorityRank(Priority.URGENT)).toBe(1);
        expect(priorityRank(Priority.SUPER_URGENT)).toBe(2);
    });

    it('accepts only enumeration values', () => {
        expect(isPriority('URGENT')).toBe(true);
        expect(isPriority('urgent')).toBe(false);
        expect(isPriority(1)).toBe(false);
        expect(isPriority(undefined)).toBe(false);
    });

    it('compares by rank, then joinedAt, then sequence', () => {
        const early = makeEntry({ joinedAt: new Date(DAY_START) });
        const late = makeEntry({ joinedAt: new Date(DAY_START + 1) });
        const urgentLate = makeEntry({ priority: Priority.URGENT, joinedAt: new Date(DAY_START + 1) });

        expect(compareServiceKeys(serviceKey(urgentLate, 5), serviceKey(early, 0))).toBeLessThan(0);
        expect(compareServiceKeys(serviceKey(early, 9), serviceKey(late, 0))).toBeLessThan(0);
        expect(compareServiceKeys(serviceKey(early, 1), serviceKey(early, 2))).toBeLessThan(0);
        expect(compareServiceKeys(serviceKey(early, 2), serviceKey(early, 2))).toBe(0);
    });
});
