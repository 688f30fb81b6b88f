// src/lib/filters/crossoverFilter.ts
// ---------------------------------------------------------------
// CROSSOVER-WITH-STRENGTH FILTER
// MACD line crossing its signal line, confirmed by the close
// relative to a long trend EMA and by ADX trend strength.
// ---------------------------------------------------------------

import { calculateADX, calculateEMA, calculateMACD } from '../indicators';
import type { MarketContext, PriceBar } from '../../types';
import { isTradable, type SignalFilter } from './types';

export interface CrossoverParams {
    fastPeriod: number;
    slowPeriod: number;
    signalPeriod: number;
    trendEmaPeriod: number;
    adxPeriod: number;
    adxThreshold: number;
}

/** Latest indicator readings the crossover decision needs */
export interface CrossoverReadings {
    close: number;
    trendEma: number;
    adx: number;
    macd: number;
    signal: number;
    previousMacd: number;
    previousSignal: number;
}

export function crossoverConfirms(
    context: MarketContext,
    r: CrossoverReadings,
    adxThreshold: number
): boolean {
    if (r.adx < adxThreshold) return false;

    if (context === 'TrendingUp') {
        return r.close > r.trendEma && r.previousMacd < r.previousSignal && r.macd > r.signal;
    }
    if (context === 'TrendingDown') {
        return r.close < r.trendEma && r.previousMacd > r.previousSignal && r.macd < r.signal;
    }
    return false;
}

/**
 * Compute the readings from bars; null until every indicator has warmed up.
 */
export function readCrossoverInputs(bars: readonly PriceBar[], params: CrossoverParams): CrossoverReadings | null {
    const closes = bars.map(b => b.close);

    const macd = calculateMACD(closes, params.fastPeriod, params.slowPeriod, params.signalPeriod);
    const trendEma = calculateEMA(closes, params.trendEmaPeriod).at(-1);
    const adx = calculateADX(
        bars.map(b => b.high),
        bars.map(b => b.low),
        closes,
        params.adxPeriod
    ).at(-1)?.adx;

    if (macd.length < 2 || trendEma === undefined || adx === undefined) return null;

    const current = macd[macd.length - 1];
    const previous = macd[macd.length - 2];

    // MACD line = histogram + signal
    return {
        close: closes[closes.length - 1],
        trendEma,
        adx,
        macd: current.histogram + current.signal,
        signal: current.signal,
        previousMacd: previous.histogram + previous.signal,
        previousSignal: previous.signal,
    };
}

export class CrossoverStrengthFilter implements SignalFilter {
    public readonly kind = 'macd-adx';

    constructor(private readonly params: CrossoverParams) { }

    public confirms(context: MarketContext, bars: readonly PriceBar[]): boolean {
        if (!isTradable(context)) return false;
        const readings = readCrossoverInputs(bars, this.params);
        return readings !== null && crossoverConfirms(context, readings, this.params.adxThreshold);
    }
}
