// src/lib/services/replay.ts

/**
 * Host-side dry run: feeds historical bars through the DecisionEngine in order
 * and collects the intents it emits.
 * - Higher-timeframe bars are built by grouping every `htfFactor` primary bars
 * - An emitted intent is treated as filled, so the one-trade-per-day rule applies
 * - No fills, no exits, no PnL: this only shows what the engine would ask for
 */
import * as fs from 'fs/promises';
import { z } from 'zod';
import type { DecisionEngine } from '../engine';
import { EngineError } from '../errors';
import { createLogger } from '../logger';
import type { MarketContext, OrderIntent, PriceBar, SymbolMetadata } from '../../types';

const logger = createLogger('replay');

const BarSchema = z.object({
    timestamp: z.union([
        z.number().int(),
        z.string().datetime({ offset: true }).transform(s => Date.parse(s)),
    ]),
    open: z.number(),
    high: z.number(),
    low: z.number(),
    close: z.number(),
    volume: z.number().min(0).default(0),
});

const BarFileSchema = z.array(BarSchema);

export interface ReplayOptions {
    balance: number;
    currency: string;
    symbol: SymbolMetadata;
    /** Primary bars per higher-timeframe bar */
    htfFactor: number;
}

export interface ReplayIntent {
    timestamp: number;
    context: MarketContext;
    intent: OrderIntent;
}

export interface ReplaySummary {
    barsProcessed: number;
    contexts: Record<MarketContext, number>;
    intents: ReplayIntent[];
    diagnostics: number;
}

/**
 * Read a JSON array of bars. Timestamps may be epoch ms or ISO-8601 strings.
 */
export async function loadBarsFromFile(file: string): Promise<PriceBar[]> {
    const text = await fs.readFile(file, 'utf8');
    const parsed = BarFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
        throw new EngineError('InvalidInput', `Invalid bar file ${file}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
}

/** Merge consecutive bars into one: first open, extreme high/low, last close, summed volume */
export function mergeBars(group: readonly PriceBar[]): PriceBar {
    if (group.length === 0) {
        throw new EngineError('InvalidInput', 'Cannot merge an empty bar group');
    }
    return {
        timestamp: group[0].timestamp,
        open: group[0].open,
        high: Math.max(...group.map(b => b.high)),
        low: Math.min(...group.map(b => b.low)),
        close: group[group.length - 1].close,
        volume: group.reduce((s, b) => s + b.volume, 0),
    };
}

export function runReplay(bars: readonly PriceBar[], options: ReplayOptions, engine: DecisionEngine): ReplaySummary {
    if (!Number.isInteger(options.htfFactor) || options.htfFactor < 1) {
        throw new EngineError('InvalidConfig', `htfFactor must be a positive integer (got ${options.htfFactor})`);
    }

    const contexts: Record<MarketContext, number> = { Undefined: 0, TrendingUp: 0, TrendingDown: 0, Ranging: 0 };
    const intents: ReplayIntent[] = [];
    let diagnostics = 0;
    let session = engine.createSession();
    let pending: PriceBar[] = [];

    for (const bar of bars) {
        pending.push(bar);
        let higherTimeframeBar: PriceBar | undefined;
        if (pending.length === options.htfFactor) {
            higherTimeframeBar = mergeBars(pending);
            pending = [];
        }

        const evaluation = engine.evaluate(session, {
            bar,
            higherTimeframeBar,
            serverTime: bar.timestamp,
            account: { balance: options.balance, currency: options.currency },
            symbol: options.symbol,
            openPositions: [],
            quote: { bid: bar.close, ask: bar.close },
        });
        session = evaluation.session;

        const { result } = evaluation;
        contexts[result.context] += 1;
        diagnostics += result.diagnostics.length;

        if (result.orderIntent) {
            intents.push({ timestamp: bar.timestamp, context: result.context, intent: result.orderIntent });
            session = engine.recordExecution(session, { success: true, serverTime: bar.timestamp });
        }
    }

    logger.debug(`Replayed ${bars.length} bars, ${intents.length} intents`);
    return { barsProcessed: bars.length, contexts, intents, diagnostics };
}
