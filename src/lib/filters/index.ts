// src/lib/filters/index.ts
import type { Config } from '../config/settings';
import { CrossoverStrengthFilter } from './crossoverFilter';
import { OscillatorThresholdFilter } from './oscillatorFilter';
import { PassThroughFilter, type SignalFilter } from './types';

export type FilterConfig = Config['filter'];

export function createSignalFilter(settings: FilterConfig): SignalFilter {
    switch (settings.kind) {
        case 'none':
            return new PassThroughFilter();
        case 'rsi':
            return new OscillatorThresholdFilter(settings);
        case 'macd-adx':
            return new CrossoverStrengthFilter(settings);
    }
}

export { CrossoverStrengthFilter, crossoverConfirms, readCrossoverInputs } from './crossoverFilter';
export type { CrossoverParams, CrossoverReadings } from './crossoverFilter';
export { OscillatorThresholdFilter, oscillatorConfirms } from './oscillatorFilter';
export type { OscillatorParams } from './oscillatorFilter';
export { PassThroughFilter, isTradable } from './types';
export type { SignalFilter } from './types';
