
/**
 * A fixed-width vector of boolean flags.
 *
 * Flags are addressed by index `0 .. size - 1`. `toString()` renders them in
 * index order, so a two-flag field with only flag 1 set prints as `"01"`.
 */
export class BitField {
    private flags: boolean[];

    constructor(size: number = 32) {
        checkSize(size);
        this.flags = new Array<boolean>(size).fill(false);
    }

    static fromString(bits: string): BitField {
        if (!/^[01]*$/.test(bits)) {
            throw new RangeError(`BitField text must contain only 0 and 1, got "${bits}"`);
        }
        const field = new BitField(bits.length);
        for (let i = 0; i < bits.length; i++) {
            field.flags[i] = bits[i] === '1';
        }
        return field;
    }

    public get size(): number {
        return this.flags.length;
    }

    public get(index: number): boolean {
        this.checkIndex(index);
        return this.flags[index];
    }

    public set(index: number, value: boolean = true): void {
        this.checkIndex(index);
        this.flags[index] = value;
    }

    public unset(index: number): void {
        this.set(index, false);
    }

    public clear(): void {
        this.flags.fill(false);
    }

    /**
     * Changes the width. Surviving flags keep their state; new flags start false.
     */
    public resize(size: number): void {
        checkSize(size);
        if (size < this.flags.length) {
            this.flags.length = size;
        } else {
            while (this.flags.length < size) this.flags.push(false);
        }
    }

    /** Removes the flag at `index`, shifting later flags down by one. */
    public removeAt(index: number): void {
        this.checkIndex(index);
        this.flags.splice(index, 1);
    }

    public clone(): BitField {
        const copy = new BitField(0);
        copy.flags = this.flags.slice();
        return copy;
    }

    public equals(other: BitField): boolean {
        return this.flags.length === other.flags.length
            && this.flags.every((flag, i) => flag === other.flags[i]);
    }

    public toString(): string {
        return this.flags.map(flag => (flag ? '1' : '0')).join('');
    }

    private checkIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.flags.length) {
            throw new RangeError(`BitField index ${index} out of range [0, ${this.flags.length})`);
        }
    }
}

function checkSize(size: number): void {
    if (!Number.isInteger(size) || size < 0) {
        throw new RangeError(`BitField size must be a non-negative integer, got ${size}`);
    }
}
