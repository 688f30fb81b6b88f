// src/lib/context/momentum.ts
import { calculateMomentum } from '../indicators';
import type { MarketContext, PriceBar } from '../../types';
import type { Classification, ContextClassifier } from './types';

export interface MomentumParams {
    lookback: number;
    thresholdPips: number;
}

/**
 * N-bar close-to-close change measured in pips against a fixed threshold.
 */
export class MomentumClassifier implements ContextClassifier {
    public readonly kind = 'momentum';
    private readonly lookback: number;
    private readonly thresholdPips: number;

    constructor(params: MomentumParams) {
        this.lookback = params.lookback > 0 ? Math.floor(params.lookback) : 1;
        this.thresholdPips = params.thresholdPips;
    }

    public classify(bars: readonly PriceBar[], pipSize: number): MarketContext {
        return this.describe(bars, pipSize).context;
    }

    public describe(bars: readonly PriceBar[], pipSize: number): Classification {
        if (bars.length < this.lookback + 1) {
            return { context: 'Undefined', reason: 'insufficient-data', values: { bars: bars.length, required: this.lookback + 1 } };
        }
        if (!(pipSize > 0)) {
            return { context: 'Undefined', reason: 'invalid-input', values: { pipSize } };
        }

        const closes = bars.slice(-(this.lookback + 1)).map(b => b.close);
        const change = calculateMomentum(closes, this.lookback).at(-1);
        if (change === undefined) {
            return { context: 'Undefined', reason: 'insufficient-data', values: { bars: bars.length, required: this.lookback + 1 } };
        }
        const changePips = change / pipSize;
        const values = { changePips, thresholdPips: this.thresholdPips };

        if (changePips > this.thresholdPips) return { context: 'TrendingUp', reason: 'momentum', values };
        if (changePips < -this.thresholdPips) return { context: 'TrendingDown', reason: 'momentum', values };
        return { context: 'Ranging', reason: 'no-trend', values };
    }
}
