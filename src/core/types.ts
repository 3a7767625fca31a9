/**
 * Common utility types
 */

/**
 * Plain object check usable as type guard on parsed JSON
 */
export const isRecord = (v: unknown): v is Record<string, unknown> =>
    typeof v === 'object' && v !== null && !Array.isArray(v);
