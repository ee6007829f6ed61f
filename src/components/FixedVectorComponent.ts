/**
 * @file FixedVectorComponent.ts
 * @brief Two- and three-axis vectors of 16.16 fixed-point coordinates.
 *
 * Each axis is an independent signed 32-bit integer, written in x, y, z order
 * through the stream's 32-bit integer primitive. Use `toFixed`/`fromFixed`
 * from `math/fixed` to convert from and to floats.
 */

import { MessageComponent } from './MessageComponent';
import { InvalidValueError } from '../errors';
import type { BitReader, BitWriter, V2Fixed, V3Fixed } from '../types';

const AXIS_BITS = 32;

function axis(value: number, name: string): number {
    if (!Number.isInteger(value)) {
        throw new InvalidValueError(`Fixed-point ${name} must be an integer, got ${value}`);
    }
    return value | 0;
}

export class V2FixedComponent extends MessageComponent {
    private value: V2Fixed = { x: 0, y: 0 };

    constructor(value: V2Fixed = { x: 0, y: 0 }) {
        super();
        this.set(value);
    }

    /** Copy of the current vector. */
    get(): V2Fixed {
        return { x: this.value.x, y: this.value.y };
    }

    set(value: V2Fixed): void {
        this.value = { x: axis(value.x, 'x'), y: axis(value.y, 'y') };
    }

    clear(): void {
        this.value = { x: 0, y: 0 };
    }

    read(stream: BitReader): number {
        const x = stream.readS32();
        const y = stream.readS32();
        this.value = { x, y };
        return 2 * AXIS_BITS;
    }

    write(stream: BitWriter): number {
        stream.writeS32(this.value.x);
        stream.writeS32(this.value.y);
        return 2 * AXIS_BITS;
    }

    clone(): V2FixedComponent {
        return this.copyNameTo(new V2FixedComponent(this.value));
    }

    protected measure(): number {
        return 2 * AXIS_BITS;
    }
}

export class V3FixedComponent extends MessageComponent {
    private value: V3Fixed = { x: 0, y: 0, z: 0 };

    constructor(value: V3Fixed = { x: 0, y: 0, z: 0 }) {
        super();
        this.set(value);
    }

    /** Copy of the current vector. */
    get(): V3Fixed {
        return { x: this.value.x, y: this.value.y, z: this.value.z };
    }

    set(value: V3Fixed): void {
        this.value = {
            x: axis(value.x, 'x'),
            y: axis(value.y, 'y'),
            z: axis(value.z, 'z'),
        };
    }

    clear(): void {
        this.value = { x: 0, y: 0, z: 0 };
    }

    read(stream: BitReader): number {
        const x = stream.readS32();
        const y = stream.readS32();
        const z = stream.readS32();
        this.value = { x, y, z };
        return 3 * AXIS_BITS;
    }

    write(stream: BitWriter): number {
        stream.writeS32(this.value.x);
        stream.writeS32(this.value.y);
        stream.writeS32(this.value.z);
        return 3 * AXIS_BITS;
    }

    clone(): V3FixedComponent {
        return this.copyNameTo(new V3FixedComponent(this.value));
    }

    protected measure(): number {
        return 3 * AXIS_BITS;
    }
}
