import { describe, expect, it } from 'vitest';
import type { PriceBar } from '../../types';
import {
    CrossoverStrengthFilter,
    OscillatorThresholdFilter,
    PassThroughFilter,
    createSignalFilter,
    crossoverConfirms,
    oscillatorConfirms,
    readCrossoverInputs,
    type CrossoverParams,
    type CrossoverReadings,
} from './index';

function barsFromCloses(closes: number[]): PriceBar[] {
    return closes.map((close, i) => ({ timestamp: i * 900_000, open: close, high: close + 0.0005, low: close - 0.0005, close, volume: 1 }));
}

const rsiParams = { period: 14, buyThreshold: 55, sellThreshold: 45 };
const crossoverParams: CrossoverParams = {
    fastPeriod: 12,
    slowPeriod: 26,
    signalPeriod: 9,
    trendEmaPeriod: 200,
    adxPeriod: 14,
    adxThreshold: 20,
};

describe('PassThroughFilter', () => {
    it('confirms trends only', () => {
        const filter = new PassThroughFilter();
        expect(filter.confirms('TrendingUp')).toBe(true);
        expect(filter.confirms('TrendingDown')).toBe(true);
        expect(filter.confirms('Ranging')).toBe(false);
        expect(filter.confirms('Undefined')).toBe(false);
    });
});

describe('oscillator threshold', () => {
    it('buys above the buy threshold and sells below the sell threshold', () => {
        expect(oscillatorConfirms('TrendingUp', 60, rsiParams)).toBe(true);
        expect(oscillatorConfirms('TrendingUp', 55, rsiParams)).toBe(false);
        expect(oscillatorConfirms('TrendingDown', 40, rsiParams)).toBe(true);
        expect(oscillatorConfirms('TrendingDown', 50, rsiParams)).toBe(false);
        expect(oscillatorConfirms('Ranging', 90, rsiParams)).toBe(false);
    });

    it('reads RSI from the bar closes', () => {
        const filter = new OscillatorThresholdFilter(rsiParams);
        const rising = barsFromCloses(Array.from({ length: 20 }, (_, i) => 1.1 + i * 0.001));
        const falling = barsFromCloses(Array.from({ length: 20 }, (_, i) => 1.1 - i * 0.001));

        expect(filter.confirms('TrendingUp', rising)).toBe(true);
        expect(filter.confirms('TrendingDown', rising)).toBe(false);
        expect(filter.confirms('TrendingDown', falling)).toBe(true);
    });

    it('does not confirm before RSI has warmed up', () => {
        const filter = new OscillatorThresholdFilter(rsiParams);
        expect(filter.confirms('TrendingUp', barsFromCloses([1.1, 1.2, 1.3]))).toBe(false);
    });
});

describe('crossover with strength', () => {
    const bullish: CrossoverReadings = {
        close: 1.2,
        trendEma: 1.1,
        adx: 25,
        macd: 0.002,
        signal: 0.001,
        previousMacd: 0.0005,
        previousSignal: 0.001,
    };
    const bearish: CrossoverReadings = {
        close: 1.0,
        trendEma: 1.1,
        adx: 25,
        macd: -0.002,
        signal: -0.001,
        previousMacd: -0.0005,
        previousSignal: -0.001,
    };

    it('confirms a bullish cross above the trend EMA', () => {
        expect(crossoverConfirms('TrendingUp', bullish, 20)).toBe(true);
        expect(crossoverConfirms('TrendingDown', bullish, 20)).toBe(false);
    });

    it('confirms a bearish cross below the trend EMA', () => {
        expect(crossoverConfirms('TrendingDown', bearish, 20)).toBe(true);
        expect(crossoverConfirms('TrendingUp', bearish, 20)).toBe(false);
    });

    it('needs ADX at or above the threshold', () => {
        expect(crossoverConfirms('TrendingUp', { ...bullish, adx: 20 }, 20)).toBe(true);
        expect(crossoverConfirms('TrendingUp', { ...bullish, adx: 15 }, 20)).toBe(false);
    });

    it('needs an actual cross on this bar', () => {
        expect(crossoverConfirms('TrendingUp', { ...bullish, previousMacd: 0.0015 }, 20)).toBe(false);
    });

    it('needs the close on the trend side of the EMA', () => {
        expect(crossoverConfirms('TrendingUp', { ...bullish, close: 1.05 }, 20)).toBe(false);
    });

    it('does not confirm until the trend EMA has warmed up', () => {
        const bars = barsFromCloses(Array.from({ length: 60 }, (_, i) => 1.1 + i * 0.001));
        expect(readCrossoverInputs(bars, crossoverParams)).toBeNull();
        expect(new CrossoverStrengthFilter(crossoverParams).confirms('TrendingUp', bars)).toBe(false);
    });
});

describe('createSignalFilter', () => {
    it('builds the configured filter', () => {
        expect(createSignalFilter({ kind: 'none' }).kind).toBe('none');
        expect(createSignalFilter({ kind: 'rsi', ...rsiParams }).kind).toBe('rsi');
        expect(createSignalFilter({ kind: 'macd-adx', ...crossoverParams }).kind).toBe('macd-adx');
    });
});
