// src/lib/engine.ts
// ---------------------------------------------------------------
// DECISION ENGINE: one evaluation per closed bar
//   history → context → admission gate → signal filter
//   → fractal reaction (optional) → position size → order intent
//   + trailing stops on every evaluation
//
// The engine owns configuration only. Everything that changes
// between bars lives in SessionState, an immutable value that
// callers pass in and get back: evaluating the same session twice
// gives the same result.
// ---------------------------------------------------------------

import type { Config } from './config/settings';
import { createClassifier, type Classification, type ContextClassifier } from './context';
import { isEngineError } from './errors';
import { createSignalFilter, isTradable, type SignalFilter } from './filters';
import { FractalReactionMachine, IDLE, type FractalState, type FractalTransition } from './fractal/reactionMachine';
import {
    defaultAdmissionChecks,
    runAdmissionChecks,
    utcDateKey,
    type AdmissionCheck,
} from './gate/admissionGate';
import { BoundedBarHistory } from './history/barHistory';
import { createLogger } from './logger';
import { calculatePositionSize, sizingInputFor } from './risk/positionSizer';
import { computeTrailingStops } from './risk/trailingStop';
import type {
    AccountSnapshot,
    Diagnostic,
    MarketContext,
    OpenPosition,
    OrderIntent,
    PriceBar,
    Quote,
    RiskParameters,
    SymbolMetadata,
    TradeSide,
    TrailingStopIntent,
} from '../types';

const logger = createLogger('Engine');

export interface SessionState {
    readonly primary: BoundedBarHistory;
    readonly higherTimeframe: BoundedBarHistory;
    readonly fractal: FractalState;
    /** UTC date (YYYY-MM-DD) of the last successfully executed trade */
    readonly lastTradeDate: string | null;
}

export interface EvaluationInput {
    /** Newly closed primary-timeframe bar */
    bar: PriceBar;
    /** Newly closed higher-timeframe bar, when one closed on this evaluation */
    higherTimeframeBar?: PriceBar;
    /** Server time, epoch ms (UTC) */
    serverTime: number;
    account: AccountSnapshot;
    symbol: SymbolMetadata;
    openPositions: readonly OpenPosition[];
    quote: Quote;
}

export interface EvaluationResult {
    context: MarketContext;
    classification: Classification;
    orderIntent: OrderIntent | null;
    trailingStops: TrailingStopIntent[];
    fractalTransitions: FractalTransition[];
    diagnostics: Diagnostic[];
}

export interface ExecutionReport {
    success: boolean;
    serverTime: number;
    error?: string;
}

export interface EngineOptions {
    label: string;
    historyCapacity: number;
    classifier: ContextClassifier;
    filter: SignalFilter;
    /** null disables the fractal reaction path: entries follow the context directly */
    fractal: FractalReactionMachine | null;
    risk: RiskParameters;
    trailingStopPips: number;
    admissionChecks: AdmissionCheck[];
}

export class DecisionEngine {
    constructor(private readonly options: EngineOptions) { }

    /** Build an engine from the validated settings module */
    public static fromConfig(cfg: Config): DecisionEngine {
        return new DecisionEngine({
            label: cfg.label,
            historyCapacity: cfg.historyCapacity,
            classifier: createClassifier(cfg.classifier),
            filter: createSignalFilter(cfg.filter),
            fractal: cfg.fractal.enabled
                ? new FractalReactionMachine({
                    window: cfg.fractal.window,
                    reactionPercent: cfg.fractal.reactionPercent,
                    reactionTimeoutMs: cfg.fractal.reactionTimeoutMs,
                })
                : null,
            risk: cfg.risk,
            trailingStopPips: cfg.trailingStopPips,
            admissionChecks: defaultAdmissionChecks(cfg.session),
        });
    }

    public get label(): string {
        return this.options.label;
    }

    public createSession(): SessionState {
        return {
            primary: new BoundedBarHistory(this.options.historyCapacity),
            higherTimeframe: new BoundedBarHistory(this.options.historyCapacity),
            fractal: IDLE,
            lastTradeDate: null,
        };
    }

    public evaluate(session: SessionState, input: EvaluationInput): { session: SessionState; result: EvaluationResult } {
        const diagnostics: Diagnostic[] = [];
        const trailingStops = this.manageTrailingStops(input);

        // ---- 1. HISTORY (validate both bars before touching either buffer) ----
        let isNewBar: boolean;
        try {
            isNewBar = session.primary.check(input.bar) === 'append';
            if (input.higherTimeframeBar) session.higherTimeframe.check(input.higherTimeframeBar);
        } catch (err) {
            if (!isEngineError(err)) throw err;
            logger.warn(`Rejected bar input: ${err.message}`, { code: err.code });
            diagnostics.push({ code: err.code, message: err.message, details: err.details });
            return {
                session,
                result: {
                    context: 'Undefined',
                    classification: { context: 'Undefined', reason: 'invalid-input', values: {} },
                    orderIntent: null,
                    trailingStops,
                    fractalTransitions: [],
                    diagnostics,
                },
            };
        }
        const primary = session.primary.append(input.bar);
        const higherTimeframe = input.higherTimeframeBar
            ? session.higherTimeframe.append(input.higherTimeframeBar)
            : session.higherTimeframe;

        // ---- 2. CONTEXT ----
        const bars = primary.asSequence();
        const classification = this.options.classifier.describe(bars, input.symbol.pipSize);
        const { context } = classification;

        const finish = (
            fractal: FractalState,
            fractalTransitions: FractalTransition[],
            orderIntent: OrderIntent | null = null
        ) => ({
            session: fractal === session.fractal && primary === session.primary && higherTimeframe === session.higherTimeframe
                ? session
                : { ...session, primary, higherTimeframe, fractal },
            result: { context, classification, orderIntent, trailingStops, fractalTransitions, diagnostics },
        });

        // A repeated bar has already been evaluated
        if (!isNewBar) {
            return finish(session.fractal, []);
        }

        logger.debug(`Context ${context} (${classification.reason})`, classification.values);

        // ---- 3. ADMISSION GATE ----
        const admission = runAdmissionChecks(this.options.admissionChecks, {
            serverTime: input.serverTime,
            lastTradeDate: session.lastTradeDate,
            openPositions: input.openPositions,
            symbol: input.symbol.name,
            label: this.options.label,
        });
        if (!admission.admitted) {
            diagnostics.push({ code: 'AdmissionRejected', message: admission.message, details: { reason: admission.reason } });
            const reset = this.options.fractal?.reset(session.fractal, context);
            return finish(reset?.state ?? session.fractal, reset?.transitions ?? []);
        }

        if (!isTradable(context)) {
            diagnostics.push(
                classification.reason === 'insufficient-data'
                    ? { code: 'InsufficientData', message: 'Not enough history to classify the market', details: classification.values }
                    : { code: 'NoTrend', message: `Context ${context} is not tradable` }
            );
        }

        // ---- 4. SIGNAL FILTER ----
        const confirmed = this.options.filter.confirms(context, bars);
        if (isTradable(context) && !confirmed) {
            diagnostics.push({ code: 'FilterRejected', message: `${this.options.filter.kind} filter did not confirm ${context}` });
        }

        // ---- 5. FRACTAL REACTION / ENTRY SIDE ----
        let fractal = session.fractal;
        let transitions: FractalTransition[] = [];
        let side: TradeSide | null = null;

        if (this.options.fractal) {
            const step = this.options.fractal.step(session.fractal, {
                context,
                bar: input.bar,
                higherTimeframe: higherTimeframe.asSequence(),
            });
            fractal = step.state;
            transitions = step.transitions;
            side = step.signal;
            if (transitions.length > 0) {
                logger.debug(`Fractal machine: ${transitions.join(' → ')} (now ${fractal.phase})`);
            }
        } else if (isTradable(context)) {
            side = context === 'TrendingUp' ? 'Buy' : 'Sell';
        }

        if (!confirmed || side === null) {
            return finish(fractal, transitions);
        }

        // ---- 6. POSITION SIZE ----
        const sizing = calculatePositionSize(sizingInputFor(input.account.balance, this.options.risk, input.symbol));
        if (!sizing.ok) {
            logger.info(`No trade: ${sizing.message}`);
            diagnostics.push({ code: sizing.reason, message: sizing.message });
            return finish(fractal, transitions);
        }

        const orderIntent: OrderIntent = {
            side,
            symbol: input.symbol.name,
            volume: sizing.units,
            lots: sizing.units / input.symbol.lotSize,
            stopLossPips: this.options.risk.stopLossPips,
            takeProfitPips: this.options.risk.takeProfitPips,
            label: this.options.label,
        };

        logger.info(
            `Order intent ${side} ${orderIntent.volume} units (${orderIntent.lots} lots), ` +
            `SL=${orderIntent.stopLossPips} pips, TP=${orderIntent.takeProfitPips} pips, ` +
            `Risk=${this.options.risk.riskPercentPerTrade}% (${sizing.riskAmount} ${input.account.currency})`
        );

        return finish(fractal, transitions, orderIntent);
    }

    /**
     * Feed back the host's execution result. Only a successful execution
     * consumes the day's trade.
     */
    public recordExecution(session: SessionState, report: ExecutionReport): SessionState {
        if (!report.success) {
            logger.warn(`Order execution failed: ${report.error ?? 'unknown error'}`);
            return session;
        }
        return { ...session, lastTradeDate: utcDateKey(report.serverTime) };
    }

    /** Trailing stops alone, e.g. on every tick */
    public manageTrailingStops(
        input: Pick<EvaluationInput, 'openPositions' | 'quote' | 'symbol'>
    ): TrailingStopIntent[] {
        const intents = computeTrailingStops(input.openPositions, input.quote, input.symbol, {
            label: this.options.label,
            trailingStopPips: this.options.trailingStopPips,
        });
        for (const intent of intents) {
            logger.info(`Trailing stop for position #${intent.positionId} → ${intent.newStopLossPrice}`);
        }
        return intents;
    }
}
