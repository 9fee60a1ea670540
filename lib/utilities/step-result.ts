/**
 * @format
 * Step Results
 *
 * Every configurator step reports success or failure as a value. Nothing
 * below the orchestrator exits the process.
 */

export interface StepError {
    /** Step or component that failed (e.g. 'node-config', 'metadata') */
    readonly step: string;
    readonly message: string;
    readonly cause?: unknown;
}

export type StepResult<T = void> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: StepError };

export function succeed(): StepResult<void>;
export function succeed<T>(value: T): StepResult<T>;
export function succeed<T>(value?: T): StepResult<T | undefined> {
    return { ok: true, value };
}

export function fail<T = never>(step: string, message: string, cause?: unknown): StepResult<T> {
    return { ok: false, error: { step, message, cause } };
}

/**
 * Render a caught value for a log message.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
