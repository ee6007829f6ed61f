/**
 * @file StringComponent.ts
 * @brief Terminator-delimited UTF-8 text.
 *
 * Occupies `8 * (byteLength + 1)` bits: the encoded text plus one terminator
 * byte. The width changes with the text, so every mutation invalidates the
 * cached size.
 */

import { MessageComponent } from './MessageComponent';
import { InvalidValueError } from '../errors';
import type { BitReader, BitWriter } from '../types';

const textEncoder = new TextEncoder();

export class StringComponent extends MessageComponent {
    private value: string = '';

    constructor(value: string = '') {
        super();
        this.set(value);
    }

    get(): string {
        return this.value;
    }

    set(value: string): void {
        if (value.includes('\0')) {
            throw new InvalidValueError('String value must not contain a NUL character');
        }
        this.value = value;
        this.invalidate();
    }

    clear(): void {
        this.value = '';
        this.invalidate();
    }

    read(stream: BitReader): number {
        this.value = stream.readString();
        this.invalidate();
        return this.size();
    }

    write(stream: BitWriter): number {
        stream.writeString(this.value);
        return this.size();
    }

    clone(): StringComponent {
        return this.copyNameTo(new StringComponent(this.value));
    }

    protected measure(): number {
        return 8 * (textEncoder.encode(this.value).length + 1);
    }
}
