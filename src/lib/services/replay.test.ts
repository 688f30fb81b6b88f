import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { MomentumClassifier } from '../context';
import { DecisionEngine } from '../engine';
import { EngineError } from '../errors';
import { PassThroughFilter } from '../filters';
import { dailyLimitCheck, noOpenPositionCheck } from '../gate/admissionGate';
import type { PriceBar, SymbolMetadata } from '../../types';
import { loadBarsFromFile, mergeBars, runReplay } from './replay';

const fixtures = path.resolve(__dirname, '../../../fixtures');
const T0 = Date.UTC(2024, 2, 4, 8, 0);

const symbol: SymbolMetadata = {
    name: 'EURUSD',
    pipSize: 0.0001,
    pipValue: 0.0001,
    volumeMin: 1000,
    volumeMax: 10_000_000,
    volumeStep: 1000,
    digits: 5,
    lotSize: 100_000,
};

function bar(i: number, close: number): PriceBar {
    return { timestamp: T0 + i * 900_000, open: close, high: close + 0.0005, low: close - 0.0005, close, volume: 10 };
}

describe('mergeBars', () => {
    it('combines a group into one higher-timeframe bar', () => {
        const merged = mergeBars([
            { timestamp: 1000, open: 1.1, high: 1.12, low: 1.09, close: 1.11, volume: 5 },
            { timestamp: 2000, open: 1.11, high: 1.15, low: 1.1, close: 1.14, volume: 7 },
            { timestamp: 3000, open: 1.14, high: 1.14, low: 1.08, close: 1.13, volume: 1 },
        ]);
        expect(merged).toEqual({ timestamp: 1000, open: 1.1, high: 1.15, low: 1.08, close: 1.13, volume: 13 });
    });

    it('refuses an empty group', () => {
        expect(() => mergeBars([])).toThrow(EngineError);
    });
});

describe('loadBarsFromFile', () => {
    it('reads epoch and ISO timestamps', async () => {
        const bars = await loadBarsFromFile(path.join(fixtures, 'test-bars.json'));
        expect(bars.map(b => b.timestamp)).toEqual([1709539200000, 1709540100000, 1709541000000]);
        expect(bars[1].volume).toBe(0);
        expect(bars[2]).toEqual({ timestamp: 1709541000000, open: 1.1015, high: 1.1018, low: 1.0999, close: 1.1001, volume: 800 });
    });

    it('rejects a malformed file', async () => {
        await expect(loadBarsFromFile(path.join(fixtures, 'invalid-bars.json'))).rejects.toThrow(/Invalid bar file/);
    });
});

describe('runReplay', () => {
    const engine = new DecisionEngine({
        label: 'test-bot',
        historyCapacity: 50,
        classifier: new MomentumClassifier({ lookback: 2, thresholdPips: 5 }),
        filter: new PassThroughFilter(),
        fractal: null,
        risk: { riskPercentPerTrade: 1, stopLossPips: 20, takeProfitPips: 40 },
        trailingStopPips: 0,
        admissionChecks: [dailyLimitCheck, noOpenPositionCheck],
    });
    const options = { balance: 10_000, currency: 'USD', symbol, htfFactor: 2 };

    it('replays bars and honours the daily trade limit', () => {
        const bars = [1.1, 1.101, 1.102, 1.103, 1.104].map((close, i) => bar(i, close));
        const summary = runReplay(bars, options, engine);

        expect(summary.barsProcessed).toBe(5);
        expect(summary.contexts).toEqual({ Undefined: 2, TrendingUp: 3, TrendingDown: 0, Ranging: 0 });
        expect(summary.intents).toHaveLength(1);
        expect(summary.intents[0].timestamp).toBe(T0 + 2 * 900_000);
        expect(summary.intents[0].intent.volume).toBe(50_000);
        // two InsufficientData + two AdmissionRejected
        expect(summary.diagnostics).toBe(4);
    });

    it('requires a positive integer htfFactor', () => {
        expect(() => runReplay([], { ...options, htfFactor: 0 }, engine)).toThrow(/htfFactor/);
    });
});
