// src/lib/fractal/fractals.ts
import { EngineError } from '../errors';
import type { PriceBar } from '../../types';

export type FractalKind = 'up' | 'down';

/** A bar's high (up) or low (down) that is a strict local extremum */
export interface FractalLevel {
    kind: FractalKind;
    price: number;
    /** Index within the sequence that was scanned */
    index: number;
    timestamp: number;
}

/**
 * Most recent fractal of the given kind.
 * Scans backward from the newest bar that still has `window` bars on its right.
 * An up-fractal's high strictly exceeds the highs of the `window` bars on each
 * side; a down-fractal's low is strictly below the neighbouring lows.
 */
export function findFractal(bars: readonly PriceBar[], kind: FractalKind, window: number): FractalLevel | null {
    if (!Number.isInteger(window) || window < 1) {
        throw new EngineError('InvalidConfig', `Fractal window must be a positive integer (got ${window})`);
    }

    const value = kind === 'up' ? (b: PriceBar) => b.high : (b: PriceBar) => b.low;
    const beats = kind === 'up' ? (a: number, b: number) => a > b : (a: number, b: number) => a < b;

    for (let i = bars.length - 1 - window; i >= window; i--) {
        const candidate = value(bars[i]);
        let extreme = true;
        for (let k = 1; k <= window && extreme; k++) {
            extreme = beats(candidate, value(bars[i - k])) && beats(candidate, value(bars[i + k]));
        }
        if (extreme) {
            return { kind, price: candidate, index: i, timestamp: bars[i].timestamp };
        }
    }
    return null;
}
