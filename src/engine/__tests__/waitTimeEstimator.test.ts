import { describe, it, expect } from 'vitest';
import { DAY_START, makeEntry, MINUTE } from '../../__tests__/fixtures';
import { EntryState, Priority } from '../../models/QueueEntry';
import { DEFAULT_SERVICE_MS, WaitTimeEstimator } from '../waitTimeEstimator';

const at = (minute: number) => new Date(DAY_START + minute * MINUTE);

function served(id: string, joinedMinute: number, servedMinute: number, specializationKey = 'cardiology') {
    return makeEntry({
        id,
        specializationKey,
        state: EntryState.SERVED,
        joinedAt: at(joinedMinute),
        servedAt: at(servedMinute)
    });
}

describe('WaitTimeEstimator', () => {
    it('uses 15 minutes per position by default', () => {
        const estimator = new WaitTimeEstimator();

        expect(DEFAULT_SERVICE_MS).toBe(15 * MINUTE);
        expect(estimator.estimate(1, 'cardiology')).toBe(15 * MINUTE);
        expect(estimator.estimate(3, 'cardiology')).toBe(45 * MINUTE);
    });

    it('is monotonic in position', () => {
        const estimator = new WaitTimeEstimator({ defaultServiceMs: 7 * MINUTE });
        const estimates = [1, 2, 3, 4, 5].map(position => estimator.estimate(position, 'neurology'));

        for (let i = 1; i < estimates.length; i++) {
            expect(estimates[i]).toBeGreaterThan(estimates[i - 1]);
        }
    });

    it('keeps the configured default until minSamples intervals are seen', () => {
        const estimator = new WaitTimeEstimator({ defaultServiceMs: 10 * MINUTE, minSamples: 2 });

        estimator.recordServe(served('a', 0, 5));
        estimator.recordServe(served('b', 0, 25));   // first interval: 20 min

        expect(estimator.averageServiceDuration('cardiology')).toBe(10 * MINUTE);

        estimator.recordServe(served('c', 0, 45));   // second interval: 20 min

        expect(estimator.averageServiceDuration('cardiology')).toBeCloseTo(20 * MINUTE);
    });

    it('smooths intervals with an exponential moving average', () => {
        const estimator = new WaitTimeEstimator({ alpha: 0.5, minSamples: 1 });

        estimator.recordServe(served('a', -10, 0));
        estimator.recordServe(served('b', -5, 10));   // 10 min
        estimator.recordServe(served('c', -5, 30));   // 20 min → 0.5·20 + 0.5·10

        expect(estimator.averageServiceDuration('cardiology')).toBe(15 * MINUTE);
        expect(estimator.estimate(2, 'cardiology')).toBe(30 * MINUTE);
    });

    it('does not count idle desk time before the patient arrived', () => {
        const estimator = new WaitTimeEstimator({ minSamples: 1 });

        estimator.recordServe(served('a', 0, 0));
        estimator.recordServe(served('b', 50, 55));

        expect(estimator.averageServiceDuration('cardiology')).toBe(5 * MINUTE);
    });

    it('keeps history per specialization', () => {
        const estimator = new WaitTimeEstimator({ minSamples: 1 });

        estimator.recordServe(served('a', 0, 0, 'neurology'));
        estimator.recordServe(served('b', 0, 4, 'neurology'));

        expect(estimator.averageServiceDuration('neurology')).toBe(4 * MINUTE);
        expect(estimator.averageServiceDuration('cardiology')).toBe(DEFAULT_SERVICE_MS);
    });

    it('uses the same average for every priority class (scoped per specialization only)', () => {
        const estimator = new WaitTimeEstimator({ minSamples: 1 });

        estimator.recordServe({ ...served('a', 0, 0), priority: Priority.SUPER_URGENT });
        estimator.recordServe({ ...served('b', 0, 6), priority: Priority.NORMAL });

        // estimate() takes no priority: an URGENT and a NORMAL patient at the same position get the same figure
        expect(estimator.estimate(2, 'cardiology')).toBe(12 * MINUTE);
    });

    it('summarises served waits', () => {
        const estimator = new WaitTimeEstimator();

        estimator.recordServe(served('a', 1, 10));   // 9 min
        estimator.recordServe(served('b', 0, 21));   // 21 min

        expect(estimator.summary('cardiology')).toEqual({
            averageServiceMs: DEFAULT_SERVICE_MS,
            samples: 1,
            servedCount: 2,
            averageWaitMs: 15 * MINUTE
        });
        expect(estimator.summary('neurology')).toEqual({
            averageServiceMs: DEFAULT_SERVICE_MS,
            samples: 0,
            servedCount: 0,
            averageWaitMs: 0
        });
    });

    it('ignores entries without servedAt', () => {
        const estimator = new WaitTimeEstimator();

        estimator.recordServe(makeEntry());

        expect(estimator.summary('cardiology').servedCount).toBe(0);
    });

    it('rejects an alpha outside (0, 1]', () => {
        expect(() => new WaitTimeEstimator({ alpha: 0 })).toThrow(RangeError);
        expect(() => new WaitTimeEstimator({ alpha: 1.5 })).toThrow(RangeError);
        expect(() => new WaitTimeEstimator({ defaultServiceMs: 0 })).toThrow(RangeError);
    });
});
