/**
 * @file BitStream.ts
 * @brief Growable bit-granular buffer that components read from and write to.
 *
 * Bits are packed most significant bit first within each byte. Writes append
 * at the write cursor; reads consume from an independent read cursor and can
 * never pass what has been written.
 *
 * @example
 * ```typescript
 * const stream = new BitStream();
 * stream.writeBits(5, 3);
 * stream.writeString('hi');
 *
 * stream.readBits(3);   // 5
 * stream.readString();  // 'hi'
 * ```
 */

import { parseOptions, BitStreamConfigSchema } from '../config';
import type { BitStreamConfig, ResolvedBitStreamConfig } from '../config';
import {
    ConfigurationError,
    InvalidValueError,
    StreamExhaustedError,
    StreamOverflowError,
} from '../errors';
import type { BitReader, BitWriter } from '../types';
import { hexDump } from '../debug';
import { logger as rootLogger } from '../utils/Logger';

const logger = rootLogger.child('BitStream');

const textEncoder = new TextEncoder();
// Strict so a decoded string re-encodes to exactly the bytes it came from.
const textDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const MAX_BITS_PER_CALL = 32;

export class BitStream implements BitReader, BitWriter {
    private buf: Uint8Array;
    private writePos: number = 0;
    private readPos: number = 0;
    private readonly config: ResolvedBitStreamConfig;
    private readonly scratch = new DataView(new ArrayBuffer(4));

    constructor(config: BitStreamConfig = {}) {
        this.config = parseOptions(BitStreamConfigSchema, config, 'bit stream config');
        this.buf = new Uint8Array(this.config.initialCapacity);
    }

    /**
     * Wraps existing bytes for reading. `bitLength` limits how many of the
     * bits are readable (default: all of them).
     */
    static from(bytes: Uint8Array, bitLength: number = bytes.length * 8): BitStream {
        if (!Number.isInteger(bitLength) || bitLength < 0 || bitLength > bytes.length * 8) {
            throw new ConfigurationError(
                `bitLength ${bitLength} does not fit ${bytes.length} bytes`
            );
        }
        const stream = new BitStream({
            initialCapacity: Math.max(1, bytes.length),
            maxCapacity: Math.max(bytes.length, 65536),
        });
        stream.buf.set(bytes);
        stream.writePos = bitLength;
        return stream;
    }

    // ---------------------------------------------------------------------------
    // Cursors
    // ---------------------------------------------------------------------------

    get bitsWritten(): number {
        return this.writePos;
    }

    get bitsRead(): number {
        return this.readPos;
    }

    get bitsRemaining(): number {
        return this.writePos - this.readPos;
    }

    get byteLength(): number {
        return Math.ceil(this.writePos / 8);
    }

    /** Moves the read cursor back to the first bit. */
    rewind(): void {
        this.readPos = 0;
    }

    /** Discards everything written. */
    reset(): void {
        this.readPos = 0;
        this.writePos = 0;
    }

    /** Copy of the written bytes; trailing bits of the last byte are zero. */
    toUint8Array(): Uint8Array {
        const out = this.buf.slice(0, this.byteLength);
        const spare = this.byteLength * 8 - this.writePos;
        if (spare > 0) {
            out[out.length - 1] &= (0xff << spare) & 0xff;
        }
        return out;
    }

    toString(): string {
        return `BitStream(${this.writePos} bits written, ${this.readPos} read)\n${hexDump(this.toUint8Array())}`;
    }

    // ---------------------------------------------------------------------------
    // Raw bits
    // ---------------------------------------------------------------------------

    writeBits(value: number, n: number): void {
        checkWidth(n);
        this.ensure(n);
        const pattern = n === 32 ? value >>> 0 : (value >>> 0) & ((1 << n) - 1);
        for (let i = n - 1; i >= 0; i--) {
            this.putBit((pattern >>> i) & 1);
        }
    }

    readBits(n: number): number {
        checkWidth(n);
        this.require(n);
        let result = 0;
        for (let i = 0; i < n; i++) {
            // Multiply rather than shift so a 32-bit read stays unsigned.
            result = result * 2 + this.takeBit();
        }
        return result;
    }

    // ---------------------------------------------------------------------------
    // Typed primitives
    // ---------------------------------------------------------------------------

    writeFloat(value: number): void {
        this.scratch.setFloat32(0, value, false);
        this.writeBits(this.scratch.getUint32(0, false), 32);
    }

    readFloat(): number {
        this.scratch.setUint32(0, this.readBits(32), false);
        return this.scratch.getFloat32(0, false);
    }

    writeS32(value: number): void {
        this.writeBits(value, 32);
    }

    readS32(): number {
        return this.readBits(32) | 0;
    }

    writeString(value: string): void {
        const bytes = textEncoder.encode(value);
        this.ensure(8 * (bytes.length + 1));
        for (const b of bytes) {
            this.writeBits(b, 8);
        }
        this.writeBits(0, 8);
    }

    readString(): string {
        const start = this.readPos;
        const bytes: number[] = [];
        try {
            for (let b = this.readBits(8); b !== 0; b = this.readBits(8)) {
                bytes.push(b);
            }
        } catch (error) {
            // An unterminated string consumes nothing.
            this.readPos = start;
            throw error;
        }
        try {
            return textDecoder.decode(Uint8Array.from(bytes));
        } catch {
            this.readPos = start;
            throw new InvalidValueError(`String at bit ${start} is not valid UTF-8`);
        }
    }

    // ---------------------------------------------------------------------------
    // Private
    // ---------------------------------------------------------------------------

    private putBit(bit: number): void {
        const index = this.writePos >>> 3;
        const mask = 1 << (7 - (this.writePos & 7));
        if (bit) {
            this.buf[index] |= mask;
        } else {
            this.buf[index] &= ~mask;
        }
        this.writePos++;
    }

    private takeBit(): number {
        const bit = (this.buf[this.readPos >>> 3] >>> (7 - (this.readPos & 7))) & 1;
        this.readPos++;
        return bit;
    }

    private require(bits: number): void {
        if (this.readPos + bits > this.writePos) {
            throw new StreamExhaustedError(bits, this.writePos - this.readPos);
        }
    }

    private ensure(bits: number): void {
        const needed = Math.ceil((this.writePos + bits) / 8);
        if (needed <= this.buf.length) return;

        if (needed > this.config.maxCapacity) {
            throw new StreamOverflowError(this.config.maxCapacity);
        }

        const size = Math.min(Math.max(this.buf.length * 2, needed), this.config.maxCapacity);
        const grown = new Uint8Array(size);
        grown.set(this.buf);
        logger.debug(`Grew buffer ${this.buf.length} -> ${size} bytes`);
        this.buf = grown;
    }
}

function checkWidth(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > MAX_BITS_PER_CALL) {
        throw new RangeError(`Bit count must be an integer in [0, ${MAX_BITS_PER_CALL}], got ${n}`);
    }
}
