import { describe, expect, it } from 'vitest';
import type { MarketContext, PriceBar } from '../../types';
import { FractalReactionMachine, IDLE, type FractalState } from './reactionMachine';

const T0 = Date.UTC(2024, 2, 4, 8, 0);
const HOUR = 3_600_000;

const machine = new FractalReactionMachine({ window: 1, reactionPercent: 1, reactionTimeoutMs: HOUR });

function htfFromLows(lows: number[]): PriceBar[] {
    return lows.map((low, i) => ({ timestamp: T0 - (lows.length - i) * HOUR, open: low + 0.005, high: low + 0.01, low, close: low + 0.005, volume: 0 }));
}

function htfFromHighs(highs: number[]): PriceBar[] {
    return highs.map((high, i) => ({ timestamp: T0 - (highs.length - i) * HOUR, open: high - 0.005, high, low: high - 0.01, close: high - 0.005, volume: 0 }));
}

function bar(offsetMs: number, fields: { high?: number; low?: number; close: number }): PriceBar {
    const { close } = fields;
    return { timestamp: T0 + offsetMs, open: close, high: fields.high ?? close + 0.001, low: fields.low ?? close - 0.001, close, volume: 0 };
}

// Down-fractal at 1.08 for up trends
const upHtf = htfFromLows([1.1, 1.08, 1.09]);
// Up-fractal at 1.12 for down trends
const downHtf = htfFromHighs([1.1, 1.12, 1.11]);

function stepUp(state: FractalState, b: PriceBar, context: MarketContext = 'TrendingUp') {
    return machine.step(state, { context, bar: b, higherTimeframe: upHtf });
}

/** Walk an up trend through level tracking and the breakout at T0 (close 1.075) */
function awaitingUp(): FractalState {
    const tracked = stepUp(IDLE, bar(0, { close: 1.09 })).state;
    return stepUp(tracked, bar(0, { low: 1.07, close: 1.075 })).state;
}

describe('FractalReactionMachine', () => {
    it('tracks the latest counter-trend fractal when a trend appears', () => {
        const result = stepUp(IDLE, bar(0, { close: 1.09 }));
        expect(result.transitions).toEqual(['level-tracked']);
        expect(result.signal).toBeNull();
        expect(result.state.phase).toBe('LevelTracked');
        if (result.state.phase === 'LevelTracked') {
            expect(result.state.direction).toBe('Up');
            expect(result.state.level.price).toBe(1.08);
        }
    });

    it('stays Idle when no fractal exists', () => {
        const result = machine.step(IDLE, { context: 'TrendingUp', bar: bar(0, { close: 1.09 }), higherTimeframe: htfFromLows([1.1, 1.09]) });
        expect(result.state).toBe(IDLE);
        expect(result.transitions).toEqual([]);
    });

    it('keeps waiting while the level holds', () => {
        const tracked = stepUp(IDLE, bar(0, { close: 1.09 })).state;
        const result = stepUp(tracked, bar(0, { low: 1.085, close: 1.09 }));
        expect(result.state).toBe(tracked);
        expect(result.transitions).toEqual([]);
    });

    it('records the breakout close and reaction target', () => {
        const state = awaitingUp();
        expect(state.phase).toBe('AwaitingReaction');
        if (state.phase === 'AwaitingReaction') {
            expect(state.wait.breakoutClosePrice).toBe(1.075);
            expect(state.wait.targetReactionPrice).toBeCloseTo(1.08575, 10);
            expect(state.wait.waitStartTime).toBe(T0);
        }
    });

    it('signals a buy once price reacts past the target', () => {
        const result = stepUp(awaitingUp(), bar(15 * 60_000, { low: 1.08, close: 1.09 }));
        expect(result.signal).toBe('Buy');
        expect(result.transitions).toEqual(['confirmed']);
        expect(result.state).toBe(IDLE);
    });

    it('confirms exactly at the timeout boundary', () => {
        const result = stepUp(awaitingUp(), bar(HOUR, { low: 1.08, close: 1.09 }));
        expect(result.signal).toBe('Buy');
    });

    it('times out before checking the reaction', () => {
        const result = stepUp(awaitingUp(), bar(HOUR + 1, { low: 1.08, close: 1.09 }));
        expect(result.signal).toBeNull();
        expect(result.transitions).toEqual(['timeout']);
        expect(result.state).toBe(IDLE);
    });

    it('negates when price extends the breakout instead of reacting', () => {
        // negation level 1.075 × 0.99 = 1.06425
        const result = stepUp(awaitingUp(), bar(15 * 60_000, { low: 1.06, close: 1.07 }));
        expect(result.signal).toBeNull();
        expect(result.transitions).toEqual(['negated']);
        expect(result.state).toBe(IDLE);
    });

    it('resets when the context no longer matches', () => {
        const result = stepUp(awaitingUp(), bar(15 * 60_000, { close: 1.09 }), 'Ranging');
        expect(result.transitions).toEqual(['reset']);
        expect(result.state).toBe(IDLE);
        expect(result.signal).toBeNull();
    });

    it('resets then looks for the opposite fractal on a reversal', () => {
        const tracked = stepUp(IDLE, bar(0, { close: 1.09 })).state;
        // upHtf has no up-fractal, so the machine resets and stays Idle
        const result = stepUp(tracked, bar(0, { close: 1.07 }), 'TrendingDown');
        expect(result.transitions).toEqual(['reset']);
        expect(result.state).toBe(IDLE);
    });

    it('runs the mirrored cycle for down trends', () => {
        const step = (state: FractalState, b: PriceBar) =>
            machine.step(state, { context: 'TrendingDown', bar: b, higherTimeframe: downHtf });

        const tracked = step(IDLE, bar(0, { close: 1.11 }));
        expect(tracked.state.phase).toBe('LevelTracked');

        // target 1.125 × 0.99 = 1.11375
        const awaiting = step(tracked.state, bar(0, { high: 1.13, close: 1.125 }));
        expect(awaiting.transitions).toEqual(['breakout']);

        const confirmed = step(awaiting.state, bar(30 * 60_000, { high: 1.12, close: 1.11 }));
        expect(confirmed.signal).toBe('Sell');
        expect(confirmed.transitions).toEqual(['confirmed']);
    });

    it('reset() leaves a matching state alone', () => {
        const tracked = stepUp(IDLE, bar(0, { close: 1.09 })).state;
        expect(machine.reset(tracked, 'TrendingUp')).toEqual({ state: tracked, signal: null, transitions: [] });
    });

    it('rejects invalid parameters', () => {
        expect(() => new FractalReactionMachine({ window: 0, reactionPercent: 1, reactionTimeoutMs: HOUR })).toThrow(/window/);
        expect(() => new FractalReactionMachine({ window: 2, reactionPercent: 0, reactionTimeoutMs: HOUR })).toThrow(/Reaction percent/);
        expect(() => new FractalReactionMachine({ window: 2, reactionPercent: 1, reactionTimeoutMs: 0 })).toThrow(/timeout/);
    });
});
