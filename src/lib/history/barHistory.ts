// src/lib/history/barHistory.ts
// =============================================================================
// BOUNDED BAR HISTORY – fixed-capacity, insertion-ordered bar buffer
// Oldest bar is evicted once capacity is exceeded. A bar carrying the same
// timestamp as the last stored bar is a duplicate ingestion and is ignored.
// Instances never change: append() returns a new history.
// =============================================================================

import { EngineError } from '../errors';
import type { PriceBar } from '../../types';

export class BoundedBarHistory {
    private bars: readonly PriceBar[] = [];

    constructor(public readonly capacity: number) {
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new EngineError('InvalidConfig', `History capacity must be a positive integer (got ${capacity})`);
        }
    }

    /**
     * Validate a bar against the stored sequence without changing it.
     * @returns 'duplicate' when the bar repeats the last stored timestamp
     * @throws EngineError('InvalidInput') on out-of-order or malformed bars
     */
    public check(bar: PriceBar): 'append' | 'duplicate' {
        validateBar(bar);

        const last = this.last();
        if (!last) return 'append';
        if (bar.timestamp === last.timestamp) return 'duplicate';
        if (bar.timestamp < last.timestamp) {
            throw new EngineError(
                'InvalidInput',
                `Bar timestamp ${bar.timestamp} is older than last stored bar ${last.timestamp}`,
                { timestamp: bar.timestamp, lastTimestamp: last.timestamp }
            );
        }
        return 'append';
    }

    /**
     * Append a closed bar.
     * @returns this history unchanged when the bar repeats the last timestamp,
     *          otherwise a new history holding the bar
     */
    public append(bar: PriceBar): BoundedBarHistory {
        if (this.check(bar) === 'duplicate') return this;

        const next = new BoundedBarHistory(this.capacity);
        next.bars = [...this.bars, Object.freeze({ ...bar })].slice(-this.capacity);
        return next;
    }

    public asSequence(): readonly PriceBar[] {
        return this.bars;
    }

    public get size(): number {
        return this.bars.length;
    }

    public last(): PriceBar | undefined {
        return this.bars[this.bars.length - 1];
    }
}

function validateBar(bar: PriceBar): void {
    const fields = [bar.timestamp, bar.open, bar.high, bar.low, bar.close, bar.volume];
    if (!fields.every(Number.isFinite)) {
        throw new EngineError('InvalidInput', 'Bar contains non-finite values', { timestamp: bar.timestamp });
    }
    if (bar.high < bar.low) {
        throw new EngineError('InvalidInput', `Bar high ${bar.high} is below low ${bar.low}`, { timestamp: bar.timestamp });
    }
}
