// src/lib/risk/trailingStop.ts
import type { OpenPosition, Quote, SymbolMetadata, TrailingStopIntent } from '../../types';

export interface TrailingStopSettings {
    label: string;
    /** Distance behind the market in pips; ≤ 0 disables trailing */
    trailingStopPips: number;
}

export function roundPrice(value: number, digits: number): number {
    return Number(value.toFixed(digits));
}

/**
 * Ratchet stops of our own positions behind the market.
 *
 * Buys trail the bid, sells trail the ask. A new stop is proposed only once it
 * is past the entry price and strictly better than the current stop, so a
 * second call without price movement yields nothing.
 */
export function computeTrailingStops(
    positions: readonly OpenPosition[],
    quote: Quote,
    symbol: Pick<SymbolMetadata, 'name' | 'pipSize' | 'digits'>,
    settings: TrailingStopSettings
): TrailingStopIntent[] {
    if (!(settings.trailingStopPips > 0)) return [];

    const distance = settings.trailingStopPips * symbol.pipSize;
    const intents: TrailingStopIntent[] = [];

    for (const position of positions) {
        if (position.symbol !== symbol.name || position.label !== settings.label) continue;

        if (position.side === 'Buy') {
            const candidate = roundPrice(quote.bid - distance, symbol.digits);
            if (candidate > position.entryPrice && (position.stopLoss === null || candidate > position.stopLoss)) {
                intents.push({ positionId: position.id, newStopLossPrice: candidate, takeProfit: position.takeProfit });
            }
        } else {
            const candidate = roundPrice(quote.ask + distance, symbol.digits);
            if (candidate < position.entryPrice && (position.stopLoss === null || candidate < position.stopLoss)) {
                intents.push({ positionId: position.id, newStopLossPrice: candidate, takeProfit: position.takeProfit });
            }
        }
    }

    return intents;
}
