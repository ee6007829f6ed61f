/**
 * @file debug.ts
 * @brief Debug utilities for bitframe.
 *
 * Helpers for looking at encoded component trees during development.
 *
 * @example
 * ```typescript
 * import { describeBits, hexDump } from 'bitframe';
 *
 * const stream = new BitStream();
 * group.write(stream);
 * console.log(describeBits(stream.toUint8Array(), stream.bitsWritten));
 * ```
 */

/**
 * Creates a hex dump of binary data (like xxd/hexdump).
 *
 * @param data - Binary data to dump
 * @param bytesPerLine - Bytes per line (default: 16)
 * @returns Formatted hex dump string
 */
export function hexDump(data: ArrayBuffer | Uint8Array, bytesPerLine: number = 16): string {
    const bytes = data instanceof ArrayBuffer ? new Uint8Array(data) : data;

    if (bytes.length === 0) return '(empty)';

    const lines: string[] = [];
    for (let i = 0; i < bytes.length; i += bytesPerLine) {
        const slice = bytes.subarray(i, Math.min(i + bytesPerLine, bytes.length));
        const hex = Array.from(slice).map(b => b.toString(16).padStart(2, '0')).join(' ');
        const ascii = bytesToAscii(slice);
        const offset = i.toString(16).padStart(8, '0');
        lines.push(`${offset}  ${hex.padEnd(bytesPerLine * 3 - 1)}  |${ascii}|`);
    }

    return lines.join('\n');
}

/**
 * Converts bytes to ASCII, replacing non-printable characters with dots.
 */
function bytesToAscii(bytes: Uint8Array): string {
    return Array.from(bytes)
        .map(b => (b >= 32 && b <= 126) ? String.fromCharCode(b) : '.')
        .join('');
}

/**
 * Renders the first `bitLength` bits of `bytes` as 0/1 text, most
 * significant bit of each byte first, grouped by byte.
 *
 * @example
 * ```typescript
 * describeBits(new Uint8Array([0b10100000]), 3); // "101"
 * ```
 */
export function describeBits(bytes: Uint8Array, bitLength: number = bytes.length * 8): string {
    const limit = Math.min(bitLength, bytes.length * 8);
    let out = '';
    for (let i = 0; i < limit; i++) {
        if (i > 0 && i % 8 === 0) out += ' ';
        out += (bytes[i >>> 3] >>> (7 - (i & 7))) & 1;
    }
    return out;
}

/**
 * Formats a bit count as a human-readable size.
 */
export function formatBits(bits: number): string {
    if (bits < 8) return `${bits} bits`;
    return formatBytes(Math.ceil(bits / 8));
}

/**
 * Measures the size of data and returns human-readable string.
 */
export function formatBytes(bytes: number): string {
    if (bytes < 1024) return `${bytes} B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(2)} KB`;
    return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}
