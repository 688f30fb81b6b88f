// src/types/index.ts
// =============================================================================
// CORE TYPE DEFINITIONS – SHARED BY EVERY ENGINE MODULE
// History, classifiers, filters, the fractal state machine, sizing, trailing
// stops and the engine all speak in these types. Keep them small and stable.
// =============================================================================

/**
 * A single closed OHLCV bar.
 * Timestamps are Unix epoch milliseconds of the bar open.
 */
export interface PriceBar {
    timestamp: number;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

/**
 * Market regime. `Undefined` is the sentinel for insufficient data or invalid
 * inputs; neither `Undefined` nor `Ranging` is ever tradable.
 */
export type MarketContext = 'Undefined' | 'TrendingUp' | 'TrendingDown' | 'Ranging';

export type TradeSide = 'Buy' | 'Sell';

/** Direction the fractal/reaction cycle is trading with */
export type TrendDirection = 'Up' | 'Down';

/**
 * Read-only instrument metadata supplied by the host.
 * Volumes are expressed in base units; `lotSize` converts units to lots.
 */
export interface SymbolMetadata {
    name: string;
    pipSize: number;
    /** Account-currency value of one pip for one unit of volume */
    pipValue: number;
    volumeMin: number;
    volumeMax: number;
    volumeStep: number;
    /** Price precision (decimal places) */
    digits: number;
    lotSize: number;
}

export interface RiskParameters {
    /** Percent of balance risked per trade, 0 < R ≤ 100 */
    riskPercentPerTrade: number;
    stopLossPips: number;
    takeProfitPips: number;
}

export interface AccountSnapshot {
    balance: number;
    currency: string;
}

/** Best bid/ask at evaluation time */
export interface Quote {
    bid: number;
    ask: number;
}

/** An open position as reported by the host */
export interface OpenPosition {
    id: string;
    symbol: string;
    label: string;
    side: TradeSide;
    entryPrice: number;
    stopLoss: number | null;
    takeProfit: number | null;
}

/**
 * Entry decision handed to the execution collaborator.
 * Produced once, never mutated.
 */
export interface OrderIntent {
    side: TradeSide;
    symbol: string;
    /** Volume in broker units */
    volume: number;
    /** Same volume expressed in lots */
    lots: number;
    stopLossPips: number;
    takeProfitPips: number;
    label: string;
}

/** Stop-loss modification for one open position */
export interface TrailingStopIntent {
    positionId: string;
    newStopLossPrice: number;
    /** Existing take-profit, passed through unchanged */
    takeProfit: number | null;
}

/** Informational engine output – never used for control flow by the host */
export interface Diagnostic {
    code: string;
    message: string;
    details?: Record<string, unknown>;
}
