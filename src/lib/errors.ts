// src/lib/errors.ts

/**
 * Failure categories raised or reported by the engine.
 * `InsufficientData` is reported only; classifiers answer `Undefined` instead of throwing.
 */
export type EngineErrorCode =
    | 'InvalidInput'
    | 'InvalidConfig'
    | 'InvalidRisk'
    | 'Unaffordable'
    | 'InsufficientData';

export class EngineError extends Error {
    public readonly code: EngineErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(code: EngineErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'EngineError';
        this.code = code;
        this.details = details;
    }
}

export function isEngineError(err: unknown): err is EngineError {
    return err instanceof EngineError;
}
