// src/lib/filters/oscillatorFilter.ts
import { calculateRSI } from '../indicators';
import type { MarketContext, PriceBar } from '../../types';
import { isTradable, type SignalFilter } from './types';

export interface OscillatorParams {
    period: number;
    buyThreshold: number;
    sellThreshold: number;
}

/**
 * Pure threshold test, separated from the RSI read so it can be reasoned about alone.
 */
export function oscillatorConfirms(context: MarketContext, oscillator: number, params: OscillatorParams): boolean {
    if (context === 'TrendingUp') return oscillator > params.buyThreshold;
    if (context === 'TrendingDown') return oscillator < params.sellThreshold;
    return false;
}

/**
 * RSI threshold filter: buys need momentum above the buy threshold,
 * sells need it below the sell threshold.
 */
export class OscillatorThresholdFilter implements SignalFilter {
    public readonly kind = 'rsi';

    constructor(private readonly params: OscillatorParams) { }

    public confirms(context: MarketContext, bars: readonly PriceBar[]): boolean {
        if (!isTradable(context)) return false;
        const rsi = calculateRSI(bars.map(b => b.close), this.params.period).at(-1);
        if (rsi === undefined) return false;
        return oscillatorConfirms(context, rsi, this.params);
    }
}
