import { MessageComponent } from './MessageComponent';
import { BitField } from '../utils/BitField';
import type { BitReader, BitWriter } from '../types';

/**
 * Packed vector of boolean flags, one bit per flag in index order.
 *
 * Groups use one of these as their presence indicator, resizing it as
 * optional fields come and go.
 */
export class BitFieldComponent extends MessageComponent {
    private value: BitField;

    constructor(fields: number | BitField = 32) {
        super();
        this.value = typeof fields === 'number' ? new BitField(fields) : fields.clone();
    }

    /** Copy of the current flags. */
    get(): BitField {
        return this.value.clone();
    }

    set(value: BitField): void {
        const resized = value.size !== this.value.size;
        this.value = value.clone();
        if (resized) this.invalidate();
    }

    getFlag(index: number): boolean {
        return this.value.get(index);
    }

    setFlag(index: number, flag: boolean = true): void {
        this.value.set(index, flag);
    }

    get fieldCount(): number {
        return this.value.size;
    }

    resize(size: number): void {
        this.value.resize(size);
        this.invalidate();
    }

    removeFlag(index: number): void {
        this.value.removeAt(index);
        this.invalidate();
    }

    clear(): void {
        this.value.clear();
    }

    read(stream: BitReader): number {
        const next = new BitField(this.value.size);
        for (let i = 0; i < next.size; i++) {
            next.set(i, stream.readBits(1) === 1);
        }
        this.value = next;
        return next.size;
    }

    write(stream: BitWriter): number {
        for (let i = 0; i < this.value.size; i++) {
            stream.writeBits(this.value.get(i) ? 1 : 0, 1);
        }
        return this.value.size;
    }

    clone(): BitFieldComponent {
        return this.copyNameTo(new BitFieldComponent(this.value));
    }

    sameShape(other: MessageComponent): boolean {
        return super.sameShape(other)
            && other instanceof BitFieldComponent
            && other.fieldCount === this.fieldCount;
    }

    protected measure(): number {
        return this.value.size;
    }
}
