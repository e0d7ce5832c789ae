// src/engine/waitTimeEstimator.ts

import { QueueEntry } from '../models/QueueEntry';

export interface WaitTimeEstimatorOptions {
    defaultServiceMs?: number;   // Used until minSamples intervals are observed
    alpha?: number;              // EMA smoothing factor in (0, 1]
    minSamples?: number;
}

export const DEFAULT_SERVICE_MS = 15 * 60_000;
const DEFAULT_ALPHA = 0.3;
const DEFAULT_MIN_SAMPLES = 3;

interface ServiceHistory {
    emaServiceMs: number | null;
    samples: number;
    lastServedAtMs: number | null;
    servedCount: number;
    totalWaitMs: number;
}

/**
 * Snapshot of what the estimator knows about one specialization
 */
export interface ServiceHistorySummary {
    averageServiceMs: number;
    samples: number;
    servedCount: number;
    averageWaitMs: number;
}

/**
 * Wait-time estimator
 *
 * Model: estimate = position × average service duration, one server per
 * specialization, serial service. An approximation for the front-desk
 * display, not a scheduling guarantee.
 *
 * Average service duration is an exponential moving average of the time
 * between consecutive serves in a specialization. The interval starts at the
 * later of the previous serve and the served patient's arrival, so time the
 * desk sat idle with an empty queue is not counted as service.
 *
 * History is kept per specialization only. Priority mix does not change the
 * average: an URGENT patient at position 3 gets the same estimate as a
 * NORMAL one at position 3.
 */
export class WaitTimeEstimator {
    private readonly defaultServiceMs: number;
    private readonly alpha: number;
    private readonly minSamples: number;
    private history = new Map<string, ServiceHistory>();

    constructor(options: WaitTimeEstimatorOptions = {}) {
        this.defaultServiceMs = options.defaultServiceMs ?? DEFAULT_SERVICE_MS;
        this.alpha = options.alpha ?? DEFAULT_ALPHA;
        this.minSamples = options.minSamples ?? DEFAULT_MIN_SAMPLES;

        if (!(this.alpha > 0 && this.alpha <= 1)) {
            throw new RangeError(`EMA alpha must be in (0, 1], got ${this.alpha}`);
        }
        if (!(this.defaultServiceMs > 0)) {
            throw new RangeError(`Default service duration must be positive, got ${this.defaultServiceMs}`);
        }
    }

    /**
     * Record a serve event
     *
     * @param entry Entry that was just served (servedAt must be set)
     */
    recordServe(entry: QueueEntry): void {
        if (!entry.servedAt) {
            return;
        }

        const history = this.historyFor(entry.specializationKey);
        const servedAtMs = entry.servedAt.getTime();
        const joinedAtMs = entry.joinedAt.getTime();

        history.servedCount++;
        history.totalWaitMs += Math.max(0, servedAtMs - joinedAtMs);

        if (history.lastServedAtMs !== null) {
            const intervalStart = Math.max(history.lastServedAtMs, joinedAtMs);
            const sample = servedAtMs - intervalStart;

            if (sample > 0) {
                history.emaServiceMs = history.emaServiceMs === null
                    ? sample
                    : this.alpha * sample + (1 - this.alpha) * history.emaServiceMs;
                history.samples++;
            }
        }

        history.lastServedAtMs = Math.max(history.lastServedAtMs ?? servedAtMs, servedAtMs);
    }

    /**
     * Average service duration currently used for a specialization
     */
    averageServiceDuration(specializationKey: string): number {
        const history = this.history.get(specializationKey);
        if (!history || history.emaServiceMs === null || history.samples < this.minSamples) {
            return this.defaultServiceMs;
        }
        return history.emaServiceMs;
    }

    /**
     * Estimated wait for a 1-indexed queue position, in milliseconds
     */
    estimate(position: number, specializationKey: string): number {
        return Math.max(0, position) * this.averageServiceDuration(specializationKey);
    }

    summary(specializationKey: string): ServiceHistorySummary {
        const history = this.history.get(specializationKey);
        return {
            averageServiceMs: this.averageServiceDuration(specializationKey),
            samples: history?.samples ?? 0,
            servedCount: history?.servedCount ?? 0,
            averageWaitMs: history && history.servedCount > 0
                ? history.totalWaitMs / history.servedCount
                : 0
        };
    }

    private historyFor(specializationKey: string): ServiceHistory {
        let history = this.history.get(specializationKey);
        if (!history) {
            history = {
                emaServiceMs: null,
                samples: 0,
                lastServedAtMs: null,
                servedCount: 0,
                totalWaitMs: 0
            };
            this.history.set(specializationKey, history);
        }
        return history;
    }
}
