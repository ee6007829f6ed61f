import { MessageComponent } from './MessageComponent';
import type { BitReader, BitWriter } from '../types';

const FLOAT_BITS = 32;

/**
 * 32-bit IEEE-754 float, passed straight through to the stream's float
 * primitive. Values are rounded to single precision on `set`.
 */
export class FloatComponent extends MessageComponent {
    private value: number;

    constructor(value: number = 0) {
        super();
        this.value = Math.fround(value);
    }

    get(): number {
        return this.value;
    }

    set(value: number): void {
        this.value = Math.fround(value);
    }

    clear(): void {
        this.value = 0;
    }

    read(stream: BitReader): number {
        this.value = stream.readFloat();
        return FLOAT_BITS;
    }

    write(stream: BitWriter): number {
        stream.writeFloat(this.value);
        return FLOAT_BITS;
    }

    clone(): FloatComponent {
        return this.copyNameTo(new FloatComponent(this.value));
    }

    protected measure(): number {
        return FLOAT_BITS;
    }
}
