/**
 * @format
 * Validation Utilities
 *
 * Input validation helpers for user data and configurator options.
 */

/**
 * Validation result
 */
export interface ValidationResult<T = undefined> {
    readonly valid: boolean;
    readonly value?: T;
    readonly error?: string;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Check that a value is a plain key/value mapping (not an array or null)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a script timeout in seconds.
 *
 * Accepts numbers (fractions truncated toward zero) and integer strings
 * (surrounding whitespace allowed), the same inputs an integer conversion of
 * the raw user-data value accepts.
 */
export function validateTimeoutSeconds(raw: unknown): ValidationResult<number> {
    let seconds: number;
    if (typeof raw === 'number' && Number.isFinite(raw)) {
        seconds = Math.trunc(raw);
    } else if (typeof raw === 'string' && /^\s*[+-]?\d+\s*$/.test(raw)) {
        seconds = parseInt(raw.trim(), 10);
    } else {
        const shown = typeof raw === 'number' ? String(raw) : JSON.stringify(raw);
        return {
            valid: false,
            error: `Invalid script timeout: ${shown}. Expected an integer number of seconds`,
        };
    }

    if (!Number.isInteger(seconds) || seconds <= 0) {
        return {
            valid: false,
            error: `Invalid script timeout: ${String(raw)}. Must be a positive integer`,
        };
    }

    return { valid: true, value: seconds };
}

/**
 * Decode a base64 string, rejecting characters outside the alphabet and bad padding.
 *
 * Whitespace (line wrapping) is ignored.
 */
export function decodeBase64(encoded: string): ValidationResult<string> {
    const compact = encoded.replace(/\s+/g, '');
    if (!BASE64_PATTERN.test(compact) || compact.length % 4 !== 0) {
        return {
            valid: false,
            error: 'Invalid base64 data: unexpected characters or incorrect padding',
        };
    }

    return { valid: true, value: Buffer.from(compact, 'base64').toString('utf-8') };
}
