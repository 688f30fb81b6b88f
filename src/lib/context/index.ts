// src/lib/context/index.ts
import type { Config } from '../config/settings';
import { ChannelSlopeClassifier } from './channelSlope';
import { MomentumClassifier } from './momentum';
import type { ContextClassifier } from './types';

export type ClassifierConfig = Config['classifier'];

export function createClassifier(settings: ClassifierConfig): ContextClassifier {
    switch (settings.kind) {
        case 'momentum':
            return new MomentumClassifier(settings);
        case 'channel-slope':
            return new ChannelSlopeClassifier(settings);
    }
}

export { ChannelSlopeClassifier, emaSlope } from './channelSlope';
export type { ChannelSlopeParams, EmaSlope } from './channelSlope';
export { MomentumClassifier } from './momentum';
export type { MomentumParams } from './momentum';
export type { Classification, ClassificationReason, ContextClassifier } from './types';
