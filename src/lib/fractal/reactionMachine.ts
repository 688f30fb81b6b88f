// src/lib/fractal/reactionMachine.ts
// =============================================================================
// FRACTAL REACTION STATE MACHINE
//
// Delays trend-following entries until a counter-trend fractal on the higher
// timeframe is broken and price then reacts back in the trend direction.
//
//   Idle ──(fractal found)──▶ LevelTracked ──(level broken)──▶ AwaitingReaction
//     ▲                                                              │
//     └────────── confirmed (signal) / timeout / negated ◀──────────┘
//
// Any context that does not match the active direction resets to Idle.
// The machine never holds state itself: callers thread FractalState through.
// =============================================================================

import { EngineError } from '../errors';
import type { MarketContext, PriceBar, TradeSide, TrendDirection } from '../../types';
import { findFractal, type FractalLevel } from './fractals';

export interface ReactionWaitState {
    direction: TrendDirection;
    breakoutClosePrice: number;
    targetReactionPrice: number;
    waitStartTime: number;
}

export type FractalState =
    | { phase: 'Idle' }
    | { phase: 'LevelTracked'; direction: TrendDirection; level: FractalLevel }
    | { phase: 'AwaitingReaction'; direction: TrendDirection; level: FractalLevel; wait: ReactionWaitState };

export type FractalTransition =
    | 'reset'
    | 'level-tracked'
    | 'breakout'
    | 'confirmed'
    | 'timeout'
    | 'negated';

export interface FractalStepInput {
    context: MarketContext;
    /** Closed bar on the primary timeframe being evaluated */
    bar: PriceBar;
    /** Higher-timeframe bars the fractal is searched on */
    higherTimeframe: readonly PriceBar[];
}

export interface FractalStepResult {
    state: FractalState;
    /** Set only when a reaction was confirmed on this bar */
    signal: TradeSide | null;
    transitions: FractalTransition[];
}

export interface FractalParams {
    window: number;
    reactionPercent: number;
    reactionTimeoutMs: number;
}

export const IDLE: FractalState = Object.freeze({ phase: 'Idle' });

export function directionForContext(context: MarketContext): TrendDirection | null {
    if (context === 'TrendingUp') return 'Up';
    if (context === 'TrendingDown') return 'Down';
    return null;
}

export class FractalReactionMachine {
    constructor(private readonly params: FractalParams) {
        if (!Number.isInteger(params.window) || params.window < 1) {
            throw new EngineError('InvalidConfig', `Fractal window must be a positive integer (got ${params.window})`);
        }
        if (!(params.reactionPercent > 0)) {
            throw new EngineError('InvalidConfig', `Reaction percent must be positive (got ${params.reactionPercent})`);
        }
        if (!(params.reactionTimeoutMs > 0)) {
            throw new EngineError('InvalidConfig', `Reaction timeout must be positive (got ${params.reactionTimeoutMs})`);
        }
    }

    /**
     * Drop any tracked level or wait state that no longer matches the context.
     */
    public reset(state: FractalState, context: MarketContext): FractalStepResult {
        if (state.phase !== 'Idle' && state.direction !== directionForContext(context)) {
            return { state: IDLE, signal: null, transitions: ['reset'] };
        }
        return { state, signal: null, transitions: [] };
    }

    /**
     * Advance the machine by one closed bar.
     */
    public step(state: FractalState, input: FractalStepInput): FractalStepResult {
        const { state: current, transitions } = this.reset(state, input.context);
        const direction = directionForContext(input.context);
        if (direction === null) {
            return { state: current, signal: null, transitions };
        }

        const next = this.transition(current, direction, input);
        if (next.transition) transitions.push(next.transition);
        return { state: next.state, signal: next.signal, transitions };
    }

    private transition(
        state: FractalState,
        direction: TrendDirection,
        { bar, higherTimeframe }: FractalStepInput
    ): { state: FractalState; signal: TradeSide | null; transition?: FractalTransition } {
        const pct = this.params.reactionPercent / 100;

        switch (state.phase) {
            case 'Idle': {
                // Up trends wait for a break of the latest swing low, down trends of the latest swing high
                const level = findFractal(higherTimeframe, direction === 'Up' ? 'down' : 'up', this.params.window);
                if (!level) return { state, signal: null };
                return { state: { phase: 'LevelTracked', direction, level }, signal: null, transition: 'level-tracked' };
            }

            case 'LevelTracked': {
                const broken = direction === 'Up' ? bar.low < state.level.price : bar.high > state.level.price;
                if (!broken) return { state, signal: null };

                const wait: ReactionWaitState = {
                    direction,
                    breakoutClosePrice: bar.close,
                    targetReactionPrice: direction === 'Up' ? bar.close * (1 + pct) : bar.close * (1 - pct),
                    waitStartTime: bar.timestamp,
                };
                return {
                    state: { phase: 'AwaitingReaction', direction, level: state.level, wait },
                    signal: null,
                    transition: 'breakout',
                };
            }

            case 'AwaitingReaction': {
                const { wait } = state;
                if (bar.timestamp - wait.waitStartTime > this.params.reactionTimeoutMs) {
                    return { state: IDLE, signal: null, transition: 'timeout' };
                }

                if (direction === 'Up') {
                    if (bar.close > wait.targetReactionPrice) {
                        return { state: IDLE, signal: 'Buy', transition: 'confirmed' };
                    }
                    if (bar.low < wait.breakoutClosePrice * (1 - pct)) {
                        return { state: IDLE, signal: null, transition: 'negated' };
                    }
                } else {
                    if (bar.close < wait.targetReactionPrice) {
                        return { state: IDLE, signal: 'Sell', transition: 'confirmed' };
                    }
                    if (bar.high > wait.breakoutClosePrice * (1 + pct)) {
                        return { state: IDLE, signal: null, transition: 'negated' };
                    }
                }
                return { state, signal: null };
            }
        }
    }
}
