// src/lib/risk/positionSizer.ts
// =============================================================================
// POSITION SIZER – fixed fractional risk → broker-quantized volume
//
//   riskAmount  = balance × risk% / 100
//   riskPerUnit = stopLossPips × pipValue
//   units       = floor(riskAmount / riskPerUnit / step) × step
//
// Falling back to the broker minimum is only allowed when the minimum still
// fits inside the risk budget. Volume never leaves [min, max].
// =============================================================================

import type { RiskParameters, SymbolMetadata } from '../../types';

/** Absorbs float drift such as 2.9999999999 steps */
const STEP_EPSILON = 1e-9;

export interface SizingInput {
    balance: number;
    riskPercent: number;
    stopLossPips: number;
    pipValue: number;
    pipSize: number;
    volumeStep: number;
    volumeMin: number;
    volumeMax: number;
}

export type SizingRejection = 'InvalidConfig' | 'InvalidRisk' | 'Unaffordable' | 'ZeroVolume';

export type SizingResult =
    | {
        ok: true;
        units: number;
        riskAmount: number;
        riskPerUnit: number;
        rawUnits: number;
        usedMinimum: boolean;
        clampedToMax: boolean;
    }
    | {
        ok: false;
        reason: SizingRejection;
        message: string;
    };

export function sizingInputFor(balance: number, risk: RiskParameters, symbol: SymbolMetadata): SizingInput {
    return {
        balance,
        riskPercent: risk.riskPercentPerTrade,
        stopLossPips: risk.stopLossPips,
        pipValue: symbol.pipValue,
        pipSize: symbol.pipSize,
        volumeStep: symbol.volumeStep,
        volumeMin: symbol.volumeMin,
        volumeMax: symbol.volumeMax,
    };
}

function stepDecimals(step: number): number {
    const str = step.toString();
    const exp = str.indexOf('e-');
    if (exp !== -1) return Number(str.slice(exp + 2));
    const dot = str.indexOf('.');
    return dot === -1 ? 0 : str.length - dot - 1;
}

function reject(reason: SizingRejection, message: string): SizingResult {
    return { ok: false, reason, message };
}

export function calculatePositionSize(input: SizingInput): SizingResult {
    const { balance, riskPercent, stopLossPips, pipValue, pipSize, volumeStep, volumeMin, volumeMax } = input;

    if (!(stopLossPips > 0)) {
        return reject('InvalidConfig', `Stop loss must be greater than 0 pips to size by risk (got ${stopLossPips})`);
    }
    if (!(pipValue > 0)) {
        return reject('InvalidConfig', `Pip value (${pipValue}) is zero or negative`);
    }
    if (!(pipSize > 0)) {
        return reject('InvalidConfig', `Pip size (${pipSize}) is zero or negative`);
    }
    if (!(riskPercent > 0 && riskPercent <= 100)) {
        return reject('InvalidConfig', `Risk percent must be in (0, 100] (got ${riskPercent})`);
    }
    if (!(volumeStep > 0)) {
        return reject('InvalidConfig', `Volume step (${volumeStep}) is zero or negative`);
    }
    if (!(volumeMin > 0) || !(volumeMax >= volumeMin)) {
        return reject('InvalidConfig', `Volume bounds are invalid (min ${volumeMin}, max ${volumeMax})`);
    }
    if (!(balance > 0) || !Number.isFinite(balance)) {
        return reject('InvalidRisk', `No risk budget: balance is ${balance}`);
    }

    const riskAmount = balance * (riskPercent / 100);
    const riskPerUnit = stopLossPips * pipValue;
    if (!(riskPerUnit > 0) || !Number.isFinite(riskPerUnit)) {
        return reject('InvalidRisk', `Risk per unit (${riskPerUnit}) is zero or negative`);
    }

    const rawUnits = riskAmount / riskPerUnit;
    const steps = Math.floor(rawUnits / volumeStep + STEP_EPSILON);
    let units = Number((steps * volumeStep).toFixed(Math.min(stepDecimals(volumeStep), 20)));

    let usedMinimum = false;
    if (units < volumeMin) {
        units = volumeMin;
        usedMinimum = true;

        const costOfMinimum = volumeMin * riskPerUnit;
        if (costOfMinimum > riskAmount && riskAmount > 0) {
            return reject(
                'Unaffordable',
                `Cannot afford min volume ${volumeMin} units with risk ${riskPercent}% & SL ${stopLossPips} pips. Risk: ${riskAmount}, Cost: ${costOfMinimum}`
            );
        }
    }

    let clampedToMax = false;
    if (units > volumeMax) {
        units = volumeMax;
        clampedToMax = true;
    }

    if (units <= 0) {
        return reject('ZeroVolume', `Final volume in units is zero or negative (${units})`);
    }

    return { ok: true, units, riskAmount, riskPerUnit, rawUnits, usedMinimum, clampedToMax };
}
