// src/lib/context/types.ts
import type { MarketContext, PriceBar } from '../../types';

/**
 * Why a classifier answered the way it did.
 * `pullback` marks an inside-channel bar classified by EMA slope alone.
 */
export type ClassificationReason =
    | 'insufficient-data'
    | 'invalid-input'
    | 'breakout'
    | 'pullback'
    | 'flat'
    | 'momentum'
    | 'no-trend';

export interface Classification {
    context: MarketContext;
    reason: ClassificationReason;
    values: Record<string, number>;
}

/**
 * Common capability of every market-context strategy.
 * Implementations are stateless: the same bars always give the same answer.
 */
export interface ContextClassifier {
    readonly kind: string;
    classify(bars: readonly PriceBar[], pipSize: number): MarketContext;
    describe(bars: readonly PriceBar[], pipSize: number): Classification;
}
