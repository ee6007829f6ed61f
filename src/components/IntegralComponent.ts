/**
 * @file IntegralComponent.ts
 * @brief Booleans and 8/16/32-bit integers at a fixed bit width.
 *
 * The value is written as the raw unsigned bit pattern of its width. Setting a
 * value the width cannot hold keeps only the low bits (sign-extended again for
 * signed kinds), so `get()` always returns what a reader will decode.
 *
 * @example
 * ```typescript
 * const health = IntegralComponent.u8(100);
 * const angle = IntegralComponent.s16(-90);
 * const flags = IntegralComponent.u8(0, 4); // 4-bit field
 * const ready = IntegralComponent.bool(true);
 * ```
 */

import { MessageComponent } from './MessageComponent';
import { ConfigurationError, InvalidValueError } from '../errors';
import type { BitReader, BitWriter } from '../types';

export type IntegralKindName = 'bool' | 'u8' | 's8' | 'u16' | 's16' | 'u32' | 's32';

/**
 * Describes one integral type: its natural width and how its values map to
 * unsigned bit patterns.
 */
export interface IntegralKind<T extends number | boolean> {
    readonly name: IntegralKindName;
    /** Natural width in bits. */
    readonly bits: number;
    readonly signed: boolean;
    readonly zero: T;
    toPattern(value: T): number;
    fromPattern(pattern: number, width: number): T;
}

/** Low `width` bits of `value` as an unsigned number. */
export function maskBits(value: number, width: number): number {
    return width >= 32 ? value >>> 0 : (value >>> 0) & ((1 << width) - 1);
}

/** Interprets the low `width` bits of `pattern` as two's complement. */
export function signExtend(pattern: number, width: number): number {
    const shift = 32 - width;
    return (pattern << shift) >> shift;
}

function numericKind(name: IntegralKindName, bits: number, signed: boolean): IntegralKind<number> {
    return {
        name,
        bits,
        signed,
        zero: 0,
        toPattern: (value) => value,
        fromPattern: signed
            ? (pattern, width) => signExtend(pattern, width)
            : (pattern, width) => maskBits(pattern, width),
    };
}

const boolKind: IntegralKind<boolean> = {
    name: 'bool',
    bits: 1,
    signed: false,
    zero: false,
    toPattern: (value) => (value ? 1 : 0),
    fromPattern: (pattern) => (pattern & 1) !== 0,
};

export const IntegralKinds = {
    bool: boolKind,
    u8: numericKind('u8', 8, false),
    s8: numericKind('s8', 8, true),
    u16: numericKind('u16', 16, false),
    s16: numericKind('s16', 16, true),
    u32: numericKind('u32', 32, false),
    s32: numericKind('s32', 32, true),
};

export class IntegralComponent<T extends number | boolean = number> extends MessageComponent {
    private value: T;
    private readonly width: number;

    constructor(
        private readonly kind: IntegralKind<T>,
        value: T = kind.zero,
        width: number = kind.bits
    ) {
        super();
        if (!Number.isInteger(width) || width < 1 || width > kind.bits) {
            throw new ConfigurationError(
                `${kind.name} width must be an integer in [1, ${kind.bits}], got ${width}`
            );
        }
        this.width = width;
        this.value = this.normalize(value);
    }

    static bool(value: boolean = false): IntegralComponent<boolean> {
        return new IntegralComponent(IntegralKinds.bool, value);
    }

    static u8(value: number = 0, width?: number): IntegralComponent {
        return new IntegralComponent(IntegralKinds.u8, value, width);
    }

    static s8(value: number = 0, width?: number): IntegralComponent {
        return new IntegralComponent(IntegralKinds.s8, value, width);
    }

    static u16(value: number = 0, width?: number): IntegralComponent {
        return new IntegralComponent(IntegralKinds.u16, value, width);
    }

    static s16(value: number = 0, width?: number): IntegralComponent {
        return new IntegralComponent(IntegralKinds.s16, value, width);
    }

    static u32(value: number = 0, width?: number): IntegralComponent {
        return new IntegralComponent(IntegralKinds.u32, value, width);
    }

    static s32(value: number = 0, width?: number): IntegralComponent {
        return new IntegralComponent(IntegralKinds.s32, value, width);
    }

    get kindName(): IntegralKindName {
        return this.kind.name;
    }

    get bitWidth(): number {
        return this.width;
    }

    get(): T {
        return this.value;
    }

    set(value: T): void {
        this.value = this.normalize(value);
    }

    clear(): void {
        this.value = this.kind.zero;
    }

    read(stream: BitReader): number {
        this.value = this.kind.fromPattern(stream.readBits(this.width), this.width);
        return this.width;
    }

    write(stream: BitWriter): number {
        stream.writeBits(maskBits(this.kind.toPattern(this.value), this.width), this.width);
        return this.width;
    }

    clone(): IntegralComponent<T> {
        return this.copyNameTo(new IntegralComponent(this.kind, this.value, this.width));
    }

    sameShape(other: MessageComponent): boolean {
        return super.sameShape(other)
            && other instanceof IntegralComponent
            && other.kindName === this.kindName
            && other.bitWidth === this.width;
    }

    protected measure(): number {
        return this.width;
    }

    private normalize(value: T): T {
        const pattern = this.kind.toPattern(value);
        if (!Number.isInteger(pattern)) {
            throw new InvalidValueError(`${this.kind.name} value must be an integer, got ${pattern}`);
        }
        return this.kind.fromPattern(maskBits(pattern, this.width), this.width);
    }
}
