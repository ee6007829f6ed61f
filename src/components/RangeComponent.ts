/**
 * @file RangeComponent.ts
 * @brief Integer packed into the fewest bits its inclusive bounds allow.
 *
 * The wire form is `value - lowerBound` as an unsigned integer of
 * `ceil(log2(upperBound - lowerBound + 1))` bits. The width depends only on
 * the bounds: it is computed on the first `size()` call and cached until the
 * bounds change. A value outside the bounds is an error, never clamped.
 *
 * @example
 * ```typescript
 * const team = new RangeComponent(2, 0, 3);   // 2 bits
 * const delta = new RangeComponent(0, -5, 5); // 4 bits
 * ```
 */

import { MessageComponent } from './MessageComponent';
import { INT32_MAX, INT32_MIN, parseOptions, RangeBoundsSchema } from '../config';
import { InvalidValueError, ValueOutOfRangeError } from '../errors';
import type { BitReader, BitWriter } from '../types';

/**
 * Bits needed to distinguish every integer in `[lower, upper]`.
 */
export function rangeBitWidth(lower: number, upper: number): number {
    const span = upper - lower + 1;
    let bits = 0;
    while (2 ** bits < span) {
        bits++;
    }
    return bits;
}

export class RangeComponent extends MessageComponent {
    private value: number;
    private lowerBound: number;
    private upperBound: number;

    constructor(value: number = 0, lowerBound: number = INT32_MIN, upperBound: number = INT32_MAX) {
        super();
        const bounds = parseOptions(RangeBoundsSchema, { lowerBound, upperBound }, 'range bounds');
        this.lowerBound = bounds.lowerBound;
        this.upperBound = bounds.upperBound;
        this.value = checkInteger(value);
    }

    get(): number {
        return this.value;
    }

    /** Stores `value` as given; bounds are enforced when it is written. */
    set(value: number): void {
        this.value = checkInteger(value);
    }

    getLowerBound(): number {
        return this.lowerBound;
    }

    getUpperBound(): number {
        return this.upperBound;
    }

    setBounds(lowerBound: number, upperBound: number): void {
        const bounds = parseOptions(RangeBoundsSchema, { lowerBound, upperBound }, 'range bounds');
        this.lowerBound = bounds.lowerBound;
        this.upperBound = bounds.upperBound;
        this.invalidate();
    }

    /** Whether the current value can be written. */
    inRange(): boolean {
        return this.value >= this.lowerBound && this.value <= this.upperBound;
    }

    clear(): void {
        this.value = 0;
    }

    read(stream: BitReader): number {
        const bits = this.size();
        const decoded = stream.readBits(bits) + this.lowerBound;
        if (decoded > this.upperBound) {
            throw new ValueOutOfRangeError(decoded, this.lowerBound, this.upperBound);
        }
        this.value = decoded;
        return bits;
    }

    write(stream: BitWriter): number {
        if (!this.inRange()) {
            throw new ValueOutOfRangeError(this.value, this.lowerBound, this.upperBound);
        }
        const bits = this.size();
        stream.writeBits(this.value - this.lowerBound, bits);
        return bits;
    }

    clone(): RangeComponent {
        return this.copyNameTo(new RangeComponent(this.value, this.lowerBound, this.upperBound));
    }

    sameShape(other: MessageComponent): boolean {
        return super.sameShape(other)
            && other instanceof RangeComponent
            && other.lowerBound === this.lowerBound
            && other.upperBound === this.upperBound;
    }

    protected measure(): number {
        return rangeBitWidth(this.lowerBound, this.upperBound);
    }
}

function checkInteger(value: number): number {
    if (!Number.isSafeInteger(value)) {
        throw new InvalidValueError(`Range value must be an integer, got ${value}`);
    }
    return value;
}
