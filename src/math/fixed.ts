/**
 * 16.16 fixed-point helpers for the vector components.
 *
 * A fixed-point number is a signed 32-bit integer whose low 16 bits hold the
 * fraction.
 */

export const FRACBITS = 16;
export const FRACUNIT = 1 << FRACBITS; // 65536

// Type alias for fixed-point numbers (just integers)
export type Fixed = number;

/** Convert float to fixed-point, wrapping to 32 bits. */
export function toFixed(f: number): Fixed {
    return Math.round(f * FRACUNIT) | 0;
}

/** Convert fixed-point to float */
export function fromFixed(fp: Fixed): number {
    return fp / FRACUNIT;
}
