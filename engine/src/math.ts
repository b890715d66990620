/**
 * Limit Risk Engine - Math Utilities
 * Pure functions for common calculations
 */

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
    return Math.max(min, Math.min(max, value));
}

/**
 * Clamp to [0, 1]
 */
export function clamp01(value: number): number {
    return clamp(value, 0, 1);
}

/**
 * Round to N decimal places, ties to even.
 * A tie is a scaled value landing exactly on .5 in floating point.
 */
export function roundTo(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    const scaled = value * factor;
    const floor = Math.floor(scaled);
    if (scaled - floor !== 0.5) return Math.round(scaled) / factor;
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
}

/**
 * Check if a number is within a range (inclusive)
 */
export function inRange(value: number, min: number, max: number): boolean {
    return value >= min && value <= max;
}

/**
 * Calculate mean of an array
 */
export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Sample standard deviation (N-1 denominator).
 * Fewer than two values have no spread to estimate; returns 0.
 */
export function sampleStdDev(values: readonly number[]): number {
    if (values.length < 2) return 0;
    const m = mean(values);
    const squaredDiffs = values.map(v => Math.pow(v - m, 2));
    const variance = squaredDiffs.reduce((a, b) => a + b, 0) / (values.length - 1);
    return Math.sqrt(variance);
}

// Plain decimal or exponent notation; no hex/binary/octal literals
const FLOAT_TEXT = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;

/**
 * Parse a loose numeric cell. Accepts numbers and trimmed numeric text.
 * Returns null for empty text, trailing garbage and non-finite values.
 */
export function toFiniteNumber(raw: unknown): number | null {
    if (typeof raw === 'number') return Number.isFinite(raw) ? raw : null;
    if (typeof raw !== 'string') return null;
    const s = raw.trim();
    if (!FLOAT_TEXT.test(s)) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
}
