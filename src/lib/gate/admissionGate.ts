// src/lib/gate/admissionGate.ts
// =============================================================================
// TRADE ADMISSION GATE – precondition checks ahead of the entry path
//
// Each check is a plain function over an AdmissionContext. Checks run in
// order and the first rejection wins, so callers can compose their own list.
// None of them mutate anything: the last-trade date is committed elsewhere,
// only after the host reports a successful execution.
// =============================================================================

import type { OpenPosition } from '../../types';

const MINUTES_PER_DAY = 24 * 60;

export interface AdmissionContext {
    /** Server time, epoch ms (UTC) */
    serverTime: number;
    /** UTC date (YYYY-MM-DD) of the last executed trade */
    lastTradeDate: string | null;
    openPositions: readonly OpenPosition[];
    symbol: string;
    label: string;
}

export type AdmissionRejection = 'outside-session' | 'daily-limit' | 'position-open';

export type AdmissionResult =
    | { admitted: true }
    | { admitted: false; reason: AdmissionRejection; message: string };

export type AdmissionCheck = (ctx: AdmissionContext) => AdmissionResult;

export interface SessionWindow {
    /** Minutes after midnight, exchange time */
    startMinutes: number;
    endMinutes: number;
    /** Exchange time = UTC + offset */
    utcOffsetHours: number;
}

const ADMITTED: AdmissionResult = { admitted: true };

export function utcDateKey(epochMs: number): string {
    return new Date(epochMs).toISOString().slice(0, 10);
}

/** Minutes after midnight (fractional) in the exchange's time zone */
export function exchangeMinutesOfDay(epochMs: number, utcOffsetHours: number): number {
    const utcMinutes = (epochMs % 86_400_000) / 60_000;
    const shifted = utcMinutes + utcOffsetHours * 60;
    return ((shifted % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
}

function formatMinutes(minutes: number): string {
    const h = Math.floor(minutes / 60);
    const m = Math.floor(minutes % 60);
    return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

/**
 * Admit only inside [start, end) exchange time. A start after the end is an
 * overnight window.
 */
export function tradingSessionCheck(window: SessionWindow): AdmissionCheck {
    return ctx => {
        const now = exchangeMinutesOfDay(ctx.serverTime, window.utcOffsetHours);
        const { startMinutes: start, endMinutes: end } = window;
        const inside = start <= end
            ? now >= start && now < end
            : now >= start || now < end;

        if (inside) return ADMITTED;
        return {
            admitted: false,
            reason: 'outside-session',
            message: `Exchange time ${formatMinutes(now)} (UTC${window.utcOffsetHours >= 0 ? '+' : ''}${window.utcOffsetHours}) is outside trading hours (${formatMinutes(start)} - ${formatMinutes(end)})`,
        };
    };
}

/** One trade per UTC calendar day */
export const dailyLimitCheck: AdmissionCheck = ctx => {
    const today = utcDateKey(ctx.serverTime);
    if (ctx.lastTradeDate !== today) return ADMITTED;
    return { admitted: false, reason: 'daily-limit', message: `One trade limit for ${today} already reached` };
};

/** No second position while one with our label is open on this symbol */
export const noOpenPositionCheck: AdmissionCheck = ctx => {
    const open = ctx.openPositions.some(p => p.label === ctx.label && p.symbol === ctx.symbol);
    if (!open) return ADMITTED;
    return {
        admitted: false,
        reason: 'position-open',
        message: `An open position with label '${ctx.label}' already exists on ${ctx.symbol}`,
    };
};

export function defaultAdmissionChecks(window: SessionWindow): AdmissionCheck[] {
    return [tradingSessionCheck(window), dailyLimitCheck, noOpenPositionCheck];
}

export function runAdmissionChecks(checks: readonly AdmissionCheck[], ctx: AdmissionContext): AdmissionResult {
    for (const check of checks) {
        const result = check(ctx);
        if (!result.admitted) return result;
    }
    return ADMITTED;
}
