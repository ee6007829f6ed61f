/**
 * bitframe - Type Definitions
 *
 * The bit-stream surface every component reads from and writes to, plus the
 * small value types shared across components.
 */

// =============================================================================
// Bit Stream
// =============================================================================

/** Source a component decodes itself from. */
export interface BitReader {
    /** Reads `n` bits (0-32) as an unsigned integer. */
    readBits(n: number): number;
    /** Reads a 32-bit IEEE-754 float. */
    readFloat(): number;
    /** Reads terminator-delimited UTF-8 text; malformed bytes are rejected without being consumed. */
    readString(): string;
    /** Reads a 32-bit two's complement integer. */
    readS32(): number;
}

/** Sink a component encodes itself into. */
export interface BitWriter {
    /** Writes the low `n` bits (0-32) of `value`. */
    writeBits(value: number, n: number): void;
    writeFloat(value: number): void;
    /** Writes text followed by a terminator byte. */
    writeString(value: string): void;
    writeS32(value: number): void;
}

// =============================================================================
// Values
// =============================================================================

/** Two-axis 16.16 fixed-point vector. */
export interface V2Fixed {
    x: number;
    y: number;
}

/** Three-axis 16.16 fixed-point vector. */
export interface V3Fixed extends V2Fixed {
    z: number;
}
