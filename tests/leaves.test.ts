import { describe, it, expect } from 'vitest';
import {
    BitField,
    BitFieldComponent,
    DigestComponent,
    FloatComponent,
    StringComponent,
    V2FixedComponent,
    V3FixedComponent,
    FRACUNIT,
    toFixed,
    fromFixed,
    InvalidValueError,
    MalformedDigestError,
    describeBits,
    BitStream,
} from '../src';
import { encode, roundTrip } from './test-utils';

describe('FloatComponent', () => {
    it('round-trips at single precision', () => {
        const target = new FloatComponent();
        const { written, read } = roundTrip(new FloatComponent(0.1), target);
        expect(target.get()).toBe(Math.fround(0.1));
        expect(written).toBe(32);
        expect(read).toBe(32);
    });

    it('passes NaN through untouched', () => {
        const target = new FloatComponent();
        roundTrip(new FloatComponent(Number.NaN), target);
        expect(Number.isNaN(target.get())).toBe(true);
    });

    it('clear resets to zero and clones are independent', () => {
        const original = new FloatComponent(2.5);
        const copy = original.clone();
        copy.clear();
        expect(copy.get()).toBe(0);
        expect(original.get()).toBe(2.5);
    });
});

describe('StringComponent', () => {
    it('reserves one terminator byte', () => {
        expect(new StringComponent('doom').size()).toBe(40);
        expect(new StringComponent().size()).toBe(8);
    });

    it('measures UTF-8 bytes, not characters', () => {
        expect(new StringComponent('é').size()).toBe(24);
    });

    it('round-trips and reports the consumed bits', () => {
        const target = new StringComponent('a much longer value');
        const { written, read } = roundTrip(new StringComponent('hi'), target);
        expect(target.get()).toBe('hi');
        expect(written).toBe(24);
        expect(read).toBe(24);
        expect(target.size()).toBe(24);
    });

    it('updates its size when the text changes', () => {
        const s = new StringComponent();
        expect(s.size()).toBe(8);
        s.set('ab');
        expect(s.size()).toBe(24);
        s.clear();
        expect(s.size()).toBe(8);
    });

    it('refuses malformed UTF-8 and consumes nothing', () => {
        const stream = BitStream.from(new Uint8Array([0xe9, 0x00]));
        const target = new StringComponent('keep');

        expect(() => target.read(stream)).toThrow(InvalidValueError);
        expect(stream.bitsRead).toBe(0);
        expect(target.get()).toBe('keep');
        expect(target.size()).toBe(40);
    });

    it('reports exactly the bits it consumed, including a leading byte-order mark', () => {
        const stream = BitStream.from(new Uint8Array([0xef, 0xbb, 0xbf, 0x41, 0x00]));
        const target = new StringComponent();

        expect(target.read(stream)).toBe(40);
        expect(stream.bitsRead).toBe(40);
        expect(target.get()).toBe('\ufeffA');
        expect(encode(target)).toEqual([0xef, 0xbb, 0xbf, 0x41, 0x00]);
    });

    it('rejects text containing the terminator', () => {
        expect(() => new StringComponent('a\0b')).toThrow(InvalidValueError);
    });

    it('clones are independent', () => {
        const original = new StringComponent('player');
        const copy = original.clone();
        copy.set('x');
        expect(original.get()).toBe('player');
        expect(original.size()).toBe(56);
        expect(copy.size()).toBe(16);
    });
});

describe('fixed-point helpers', () => {
    it('converts between floats and 16.16 fixed-point', () => {
        expect(FRACUNIT).toBe(65536);
        expect(toFixed(1.5)).toBe(98304);
        expect(toFixed(-1)).toBe(-65536);
        expect(fromFixed(98304)).toBe(1.5);
    });
});

describe('V2FixedComponent', () => {
    it('writes x then y as 32-bit integers', () => {
        expect(encode(new V2FixedComponent({ x: 1, y: 2 }))).toEqual([0, 0, 0, 1, 0, 0, 0, 2]);
    });

    it('round-trips negative coordinates', () => {
        const target = new V2FixedComponent();
        const { written, read } = roundTrip(new V2FixedComponent({ x: toFixed(1.5), y: -65536 }), target);
        expect(target.get()).toEqual({ x: 98304, y: -65536 });
        expect(written).toBe(64);
        expect(read).toBe(64);
    });

    it('get returns a copy', () => {
        const v = new V2FixedComponent({ x: 3, y: 4 });
        v.get().x = 99;
        expect(v.get()).toEqual({ x: 3, y: 4 });
    });

    it('rejects fractional axes', () => {
        expect(() => new V2FixedComponent({ x: 0.5, y: 0 })).toThrow(InvalidValueError);
    });
});

describe('V3FixedComponent', () => {
    it('round-trips all three axes in order', () => {
        const source = new V3FixedComponent({ x: 1, y: -2, z: 3 });
        const target = new V3FixedComponent();
        const { written, stream } = roundTrip(source, target);
        expect(written).toBe(96);
        expect(target.get()).toEqual({ x: 1, y: -2, z: 3 });

        stream.rewind();
        expect([stream.readS32(), stream.readS32(), stream.readS32()]).toEqual([1, -2, 3]);
    });

    it('clear zeroes every axis and clones are independent', () => {
        const original = new V3FixedComponent({ x: 5, y: 6, z: 7 });
        const copy = original.clone();
        copy.clear();
        expect(copy.get()).toEqual({ x: 0, y: 0, z: 0 });
        expect(original.get()).toEqual({ x: 5, y: 6, z: 7 });
    });
});

describe('BitFieldComponent', () => {
    it('defaults to 32 flags', () => {
        expect(new BitFieldComponent().size()).toBe(32);
    });

    it('writes one bit per flag in index order', () => {
        const flags = new BitFieldComponent(BitField.fromString('101'));
        const stream = new BitStream();
        expect(flags.write(stream)).toBe(3);
        expect(describeBits(stream.toUint8Array(), stream.bitsWritten)).toBe('101');

        const target = new BitFieldComponent(3);
        expect(target.read(stream)).toBe(3);
        expect(target.get().toString()).toBe('101');
    });

    it('clear sets every flag false', () => {
        const flags = new BitFieldComponent(BitField.fromString('11'));
        flags.clear();
        expect(flags.get().toString()).toBe('00');
    });

    it('get returns a copy', () => {
        const flags = new BitFieldComponent(2);
        flags.get().set(0);
        expect(flags.getFlag(0)).toBe(false);
        flags.setFlag(0);
        expect(flags.getFlag(0)).toBe(true);
    });

    it('updates its size on resize and on set with a new width', () => {
        const flags = new BitFieldComponent(2);
        expect(flags.size()).toBe(2);
        flags.resize(5);
        expect(flags.size()).toBe(5);
        flags.set(new BitField(7));
        expect(flags.size()).toBe(7);
        expect(flags.fieldCount).toBe(7);
    });

    it('clones are independent', () => {
        const original = new BitFieldComponent(BitField.fromString('10'));
        const copy = original.clone();
        copy.setFlag(1);
        expect(original.get().toString()).toBe('10');
        expect(copy.get().toString()).toBe('11');
    });
});

describe('DigestComponent', () => {
    const HASH = '0123456789abcdef0123456789abcdef';

    it('round-trips its hex text', () => {
        const digest = new DigestComponent();
        digest.set(HASH);
        expect(digest.get()).toBe(HASH);
        expect(digest.size()).toBe(128);
    });

    it('defaults to all zeros', () => {
        expect(new DigestComponent().get()).toBe('0'.repeat(32));
    });

    it('normalizes upper-case input to lower case', () => {
        expect(new DigestComponent(HASH.toUpperCase()).get()).toBe(HASH);
    });

    it.each([
        ['too short', HASH.slice(1)],
        ['too long', HASH + '0'],
        ['not hex', 'g'.repeat(32)],
        ['empty', ''],
    ])('rejects text that is %s and keeps its value', (_label, text) => {
        const digest = new DigestComponent(HASH);
        expect(() => digest.set(text)).toThrow(MalformedDigestError);
        expect(digest.get()).toBe(HASH);
    });

    it('moves the raw 128 bits, most significant byte first', () => {
        const bytes = encode(new DigestComponent(HASH));
        expect(bytes.length).toBe(16);
        expect(bytes.slice(0, 2)).toEqual([0x01, 0x23]);

        const target = new DigestComponent();
        const { written, read } = roundTrip(new DigestComponent(HASH), target);
        expect(target.get()).toBe(HASH);
        expect(written).toBe(128);
        expect(read).toBe(128);
    });

    it('exposes a copy of the raw bytes', () => {
        const digest = new DigestComponent(HASH);
        const bytes = digest.getBytes();
        expect(bytes[15]).toBe(0xef);
        bytes[15] = 0;
        expect(digest.get()).toBe(HASH);
    });

    it('clear refreshes the cached text and clones are independent', () => {
        const original = new DigestComponent(HASH);
        const copy = original.clone();
        copy.clear();
        expect(copy.get()).toBe('0'.repeat(32));
        expect(original.get()).toBe(HASH);
        expect(original.size()).toBe(128);
    });
});
