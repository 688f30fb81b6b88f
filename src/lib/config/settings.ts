// src/lib/config/settings.ts
// =============================================================================
// CENTRAL CONFIGURATION – SINGLE SOURCE OF TRUTH
// Uses Zod + dotenv for validation & defaults
// All modules import from here → no scattered env vars
// Covers:
//   • Context classifier selection (channel-slope / momentum)
//   • Signal filter selection (none / rsi / macd-adx)
//   • Fractal reaction timing
//   • Risk, sizing & trailing stops
//   • Trading session window
//   • Replay runner
// =============================================================================

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const booleanFlag = (fallback: 'true' | 'false') =>
    z.enum(['true', 'false']).default(fallback).transform(v => v === 'true');

/** "HH:mm" → minutes after midnight */
const timeOfDay = (fallback: string) =>
    z
        .string()
        .regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm')
        .default(fallback)
        .transform(str => {
            const [h, m] = str.split(':');
            return Number(h) * 60 + Number(m);
        });

const ConfigSchema = z.object({
    // ──────────────────────────────────────────────────────────────
    // Core Environment
    // ──────────────────────────────────────────────────────────────
    ENV: z.enum(['dev', 'test', 'prod']).default('dev'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    LOG_TO_FILE: booleanFlag('false'),

    // ──────────────────────────────────────────────────────────────
    // Instrument & Label
    // ──────────────────────────────────────────────────────────────
    SYMBOL: z.string().default('EURUSD'),
    TRADE_LABEL: z.string().min(1).default('TrendReactionEngine'),
    PIP_SIZE: z.coerce.number().positive().default(0.0001),
    PIP_VALUE: z.coerce.number().positive().default(0.0001),
    VOLUME_MIN: z.coerce.number().positive().default(1000),
    VOLUME_MAX: z.coerce.number().positive().default(10_000_000),
    VOLUME_STEP: z.coerce.number().positive().default(1000),
    PRICE_DIGITS: z.coerce.number().int().min(0).max(10).default(5),
    LOT_SIZE: z.coerce.number().positive().default(100_000),

    HISTORY_CAPACITY: z.coerce.number().int().min(10).default(500),

    // ──────────────────────────────────────────────────────────────
    // Context Classifier
    // ──────────────────────────────────────────────────────────────
    CLASSIFIER: z.enum(['channel-slope', 'momentum']).default('channel-slope'),
    EMA_PERIOD: z.coerce.number().int().min(2).default(20),
    ATR_PERIOD: z.coerce.number().int().min(1).default(14),
    CHANNEL_MULTIPLIER: z.coerce.number().positive().default(1.5),
    /** Inside-channel bars with a sloped EMA classify as the slope's trend */
    PULLBACK_FOLLOWS_SLOPE: booleanFlag('true'),
    MOMENTUM_LOOKBACK: z.coerce.number().int().default(10),
    MOMENTUM_THRESHOLD_PIPS: z.coerce.number().min(0).default(20),

    // ──────────────────────────────────────────────────────────────
    // Signal Filter
    // ──────────────────────────────────────────────────────────────
    SIGNAL_FILTER: z.enum(['none', 'rsi', 'macd-adx']).default('none'),
    RSI_PERIOD: z.coerce.number().int().min(2).default(14),
    RSI_BUY_THRESHOLD: z.coerce.number().min(0).max(100).default(55),
    RSI_SELL_THRESHOLD: z.coerce.number().min(0).max(100).default(45),
    MACD_FAST: z.coerce.number().int().min(2).default(12),
    MACD_SLOW: z.coerce.number().int().min(5).default(26),
    MACD_SIGNAL: z.coerce.number().int().min(2).default(9),
    TREND_EMA_PERIOD: z.coerce.number().int().min(20).default(200),
    ADX_PERIOD: z.coerce.number().int().min(2).default(14),
    ADX_THRESHOLD: z.coerce.number().min(0).max(50).default(20),

    // ──────────────────────────────────────────────────────────────
    // Fractal Reaction
    // ──────────────────────────────────────────────────────────────
    USE_FRACTAL_REACTION: booleanFlag('false'),
    FRACTAL_WINDOW: z.coerce.number().int().min(1).default(2),
    REACTION_PERCENT: z.coerce.number().positive().default(0.1),
    REACTION_TIMEOUT_MINUTES: z.coerce.number().positive().default(240),

    // ──────────────────────────────────────────────────────────────
    // Risk Management
    // ──────────────────────────────────────────────────────────────
    RISK_PERCENT: z.coerce.number().min(0.1).max(100).default(1.0),
    STOP_LOSS_PIPS: z.coerce.number().positive().default(20),
    TAKE_PROFIT_PIPS: z.coerce.number().positive().default(40),
    /** 0 disables trailing */
    TRAILING_STOP_PIPS: z.coerce.number().min(0).default(0),

    // ──────────────────────────────────────────────────────────────
    // Trading Session
    // ──────────────────────────────────────────────────────────────
    SESSION_START: timeOfDay('09:00'),
    SESSION_END: timeOfDay('15:00'),
    UTC_OFFSET_HOURS: z.coerce.number().min(-12).max(14).default(3),

    // ──────────────────────────────────────────────────────────────
    // Replay
    // ──────────────────────────────────────────────────────────────
    REPLAY_FILE: z.string().default('./fixtures/sample-bars.json'),
    HTF_FACTOR: z.coerce.number().int().min(1).default(4),
    REPLAY_BALANCE: z.coerce.number().positive().default(10_000),
}).refine(v => v.MACD_FAST < v.MACD_SLOW, {
    message: 'MACD_FAST must be below MACD_SLOW',
    path: ['MACD_FAST'],
});

/**
 * Parse & validate an environment map into the grouped engine configuration.
 * Throws a ZodError describing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv) {
    const raw = ConfigSchema.parse(env);

    return {
        env: raw.ENV,
        log_level: raw.LOG_LEVEL,
        logToFile: raw.LOG_TO_FILE,

        label: raw.TRADE_LABEL,
        historyCapacity: raw.HISTORY_CAPACITY,

        symbol: {
            name: raw.SYMBOL,
            pipSize: raw.PIP_SIZE,
            pipValue: raw.PIP_VALUE,
            volumeMin: raw.VOLUME_MIN,
            volumeMax: raw.VOLUME_MAX,
            volumeStep: raw.VOLUME_STEP,
            digits: raw.PRICE_DIGITS,
            lotSize: raw.LOT_SIZE,
        },

        classifier: raw.CLASSIFIER === 'momentum'
            ? {
                kind: 'momentum' as const,
                lookback: raw.MOMENTUM_LOOKBACK,
                thresholdPips: raw.MOMENTUM_THRESHOLD_PIPS,
            }
            : {
                kind: 'channel-slope' as const,
                emaPeriod: raw.EMA_PERIOD,
                atrPeriod: raw.ATR_PERIOD,
                multiplier: raw.CHANNEL_MULTIPLIER,
                pullbackFollowsSlope: raw.PULLBACK_FOLLOWS_SLOPE,
            },

        filter: raw.SIGNAL_FILTER === 'rsi'
            ? {
                kind: 'rsi' as const,
                period: raw.RSI_PERIOD,
                buyThreshold: raw.RSI_BUY_THRESHOLD,
                sellThreshold: raw.RSI_SELL_THRESHOLD,
            }
            : raw.SIGNAL_FILTER === 'macd-adx'
                ? {
                    kind: 'macd-adx' as const,
                    fastPeriod: raw.MACD_FAST,
                    slowPeriod: raw.MACD_SLOW,
                    signalPeriod: raw.MACD_SIGNAL,
                    trendEmaPeriod: raw.TREND_EMA_PERIOD,
                    adxPeriod: raw.ADX_PERIOD,
                    adxThreshold: raw.ADX_THRESHOLD,
                }
                : { kind: 'none' as const },

        fractal: {
            enabled: raw.USE_FRACTAL_REACTION,
            window: raw.FRACTAL_WINDOW,
            reactionPercent: raw.REACTION_PERCENT,
            reactionTimeoutMs: raw.REACTION_TIMEOUT_MINUTES * 60_000,
        },

        risk: {
            riskPercentPerTrade: raw.RISK_PERCENT,
            stopLossPips: raw.STOP_LOSS_PIPS,
            takeProfitPips: raw.TAKE_PROFIT_PIPS,
        },
        trailingStopPips: raw.TRAILING_STOP_PIPS,

        session: {
            startMinutes: raw.SESSION_START,
            endMinutes: raw.SESSION_END,
            utcOffsetHours: raw.UTC_OFFSET_HOURS,
        },

        replay: {
            file: raw.REPLAY_FILE,
            htfFactor: raw.HTF_FACTOR,
            balance: raw.REPLAY_BALANCE,
        },
    };
}

export type Config = ReturnType<typeof loadConfig>;

/**
 * Parsed once at startup – will throw on an invalid environment
 */
export const config: Config = loadConfig(process.env);
