// src/lib/context/channelSlope.ts
// ---------------------------------------------------------------
// CHANNEL-SLOPE CLASSIFIER
// Keltner-style channel (EMA of typical price ± M × Wilder ATR)
// combined with the direction of the last three EMA values.
// ---------------------------------------------------------------

import { calculateATR, calculateEMA, typicalPrice } from '../indicators';
import type { MarketContext, PriceBar } from '../../types';
import type { Classification, ContextClassifier } from './types';

export interface ChannelSlopeParams {
    emaPeriod: number;
    atrPeriod: number;
    multiplier: number;
    /**
     * When true, a close inside the channel with a rising (falling) EMA is
     * reported as TrendingUp (TrendingDown); when false it is Ranging.
     */
    pullbackFollowsSlope: boolean;
}

export type EmaSlope = 'rising' | 'falling' | 'flat';

/** Strictly monotonic over the last three values, otherwise flat */
export function emaSlope(ema: readonly number[]): EmaSlope {
    if (ema.length < 3) return 'flat';
    const [a, b, c] = ema.slice(-3);
    if (a < b && b < c) return 'rising';
    if (a > b && b > c) return 'falling';
    return 'flat';
}

export class ChannelSlopeClassifier implements ContextClassifier {
    public readonly kind = 'channel-slope';

    constructor(private readonly params: ChannelSlopeParams) { }

    public classify(bars: readonly PriceBar[], pipSize: number): MarketContext {
        return this.describe(bars, pipSize).context;
    }

    public describe(bars: readonly PriceBar[], _pipSize: number): Classification {
        const { emaPeriod, atrPeriod, multiplier, pullbackFollowsSlope } = this.params;

        if (emaPeriod < 1 || atrPeriod < 1 || !(multiplier > 0)) {
            return { context: 'Undefined', reason: 'invalid-input', values: {} };
        }

        const required = Math.max(emaPeriod, atrPeriod);
        if (bars.length < required) {
            return { context: 'Undefined', reason: 'insufficient-data', values: { bars: bars.length, required } };
        }

        const ema = calculateEMA(bars.map(typicalPrice), emaPeriod);
        const atr = calculateATR(bars, atrPeriod);
        const lastAtr = atr.at(-1);
        if (ema.length < 3 || lastAtr === undefined) {
            return { context: 'Undefined', reason: 'insufficient-data', values: { bars: bars.length, emaValues: ema.length } };
        }

        const lastEma = ema[ema.length - 1];
        const close = bars[bars.length - 1].close;
        const upper = lastEma + multiplier * lastAtr;
        const lower = lastEma - multiplier * lastAtr;
        const slope = emaSlope(ema);
        const values = { close, ema: lastEma, atr: lastAtr, upper, lower };

        if (close > upper && slope === 'rising') {
            return { context: 'TrendingUp', reason: 'breakout', values };
        }
        if (close < lower && slope === 'falling') {
            return { context: 'TrendingDown', reason: 'breakout', values };
        }

        const inside = close >= lower && close <= upper;
        if (inside && slope === 'flat') {
            return { context: 'Ranging', reason: 'flat', values };
        }
        if (inside && pullbackFollowsSlope) {
            return {
                context: slope === 'rising' ? 'TrendingUp' : 'TrendingDown',
                reason: 'pullback',
                values,
            };
        }
        return { context: 'Ranging', reason: 'no-trend', values };
    }
}
