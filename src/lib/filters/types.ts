// src/lib/filters/types.ts
import type { MarketContext, PriceBar } from '../../types';

/**
 * Optional confirmation layer on top of a classified context.
 * Ranging and Undefined contexts are never confirmed.
 */
export interface SignalFilter {
    readonly kind: string;
    confirms(context: MarketContext, bars: readonly PriceBar[]): boolean;
}

export function isTradable(context: MarketContext): context is 'TrendingUp' | 'TrendingDown' {
    return context === 'TrendingUp' || context === 'TrendingDown';
}

/** No filter configured: every tradable context passes */
export class PassThroughFilter implements SignalFilter {
    public readonly kind = 'none';

    public confirms(context: MarketContext): boolean {
        return isTradable(context);
    }
}
