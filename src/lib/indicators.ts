// src/lib/indicators.ts
// =============================================================================
// TECHNICAL INDICATORS
// Pure functions – no side effects, no external state
// Used by: context classifiers, signal filters
// Series are returned oldest → newest; they start once the warm-up is complete
// =============================================================================

import * as ti from 'technicalindicators';
import type { ADXOutput } from 'technicalindicators/declarations/directionalmovement/ADX';
import type { MACDOutput } from 'technicalindicators/declarations/moving_averages/MACD';
import type { PriceBar } from '../types';

// -----------------------------------------------------------------------------
// 1. BAR-DERIVED VALUES
// -----------------------------------------------------------------------------
export function typicalPrice(bar: PriceBar): number {
    return (bar.high + bar.low + bar.close) / 3;
}

/** True range against the previous bar; plain high-low range for the first bar */
export function trueRange(bar: PriceBar, previous?: PriceBar): number {
    if (!previous) return bar.high - bar.low;
    return Math.max(
        bar.high - bar.low,
        Math.abs(bar.high - previous.close),
        Math.abs(bar.low - previous.close)
    );
}

// -----------------------------------------------------------------------------
// 2. MOVING AVERAGES
// -----------------------------------------------------------------------------
export function calculateEMA(values: number[], period: number = 50): number[] {
    if (period < 1 || values.length < period) return [];
    return ti.ema({ values, period });
}

// -----------------------------------------------------------------------------
// 3. MOMENTUM & STRENGTH
// -----------------------------------------------------------------------------
export function calculateRSI(values: number[], period: number = 14): number[] {
    if (values.length < period + 1) return [];
    return ti.rsi({ values, period });
}

/** Close-to-close change over `period` bars, one value per bar from index `period` on */
export function calculateMomentum(closes: readonly number[], period = 10): number[] {
    if (period < 1 || closes.length < period + 1) return [];
    return closes.slice(period).map((close, i) => close - closes[i]);
}

// -----------------------------------------------------------------------------
// 4. MACD
// -----------------------------------------------------------------------------
export interface MacdPoint {
    MACD: number;
    signal: number;
    histogram: number;
}

/**
 * EMA-based MACD. Points where the library has not produced a signal line yet
 * are dropped rather than zero-filled, so every returned point is complete.
 */
export function calculateMACD(
    values: number[],
    fastPeriod = 12,
    slowPeriod = 26,
    signalPeriod = 9
): MacdPoint[] {
    if (values.length < slowPeriod + signalPeriod) return [];

    const raw: MACDOutput[] = ti.macd({
        values,
        fastPeriod,
        slowPeriod,
        signalPeriod,
        SimpleMAOscillator: false,
        SimpleMASignal: false,
    });

    const points: MacdPoint[] = [];
    for (const item of raw) {
        if (item.MACD === undefined || item.signal === undefined || item.histogram === undefined) continue;
        points.push({ MACD: item.MACD, signal: item.signal, histogram: item.histogram });
    }
    return points;
}

// -----------------------------------------------------------------------------
// 5. AVERAGE TRUE RANGE (Wilder)
// -----------------------------------------------------------------------------
/**
 * Wilder-smoothed ATR over bars.
 * Seeded with the simple average of the first `period` true ranges, then
 * atr[i] = (atr[i-1] * (period - 1) + tr[i]) / period.
 * The first value lines up with bar index `period - 1`.
 */
export function calculateATR(bars: readonly PriceBar[], period = 14): number[] {
    if (period < 1 || bars.length < period) return [];

    const ranges = bars.map((bar, i) => trueRange(bar, i > 0 ? bars[i - 1] : undefined));

    let seed = 0;
    for (let i = 0; i < period; i++) seed += ranges[i];

    const atr: number[] = [seed / period];
    for (let i = period; i < ranges.length; i++) {
        const prev = atr[atr.length - 1];
        atr.push((prev * (period - 1) + ranges[i]) / period);
    }
    return atr;
}

// -----------------------------------------------------------------------------
// 6. TREND STRENGTH: ADX
// -----------------------------------------------------------------------------
export function calculateADX(
    highs: number[],
    lows: number[],
    closes: number[],
    period = 14
): ADXOutput[] {
    if (highs.length < period + 1) return [];
    return ti.adx({ high: highs, low: lows, close: closes, period });
}
