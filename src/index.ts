// src/index.ts
// Public surface for hosts embedding the engine

export { DecisionEngine } from './lib/engine';
export type { EngineOptions, EvaluationInput, EvaluationResult, ExecutionReport, SessionState } from './lib/engine';
export { BoundedBarHistory } from './lib/history/barHistory';
export * from './lib/context';
export * from './lib/filters';
export { findFractal } from './lib/fractal/fractals';
export type { FractalKind, FractalLevel } from './lib/fractal/fractals';
export { FractalReactionMachine, IDLE, directionForContext } from './lib/fractal/reactionMachine';
export type {
    FractalParams,
    FractalState,
    FractalStepInput,
    FractalStepResult,
    FractalTransition,
    ReactionWaitState,
} from './lib/fractal/reactionMachine';
export * from './lib/gate/admissionGate';
export { calculatePositionSize, sizingInputFor } from './lib/risk/positionSizer';
export type { SizingInput, SizingRejection, SizingResult } from './lib/risk/positionSizer';
export { computeTrailingStops, roundPrice } from './lib/risk/trailingStop';
export type { TrailingStopSettings } from './lib/risk/trailingStop';
export { EngineError, isEngineError } from './lib/errors';
export type { EngineErrorCode } from './lib/errors';
export { loadConfig, config } from './lib/config/settings';
export type { Config } from './lib/config/settings';
export * from './types';
