import { describe, it, expect } from 'vitest';
import {
    BitFieldComponent,
    BitStream,
    ComponentArray,
    ConfigurationError,
    CountOutOfBoundsError,
    IntegralComponent,
    InvalidValueError,
    MessageComponent,
    OwnershipError,
    RangeComponent,
    StreamExhaustedError,
    StringComponent,
    describeBits,
    named,
} from '../src';
import { roundTrip } from './test-utils';

function u8Array(values: number[], minCount?: number, maxCount?: number): ComponentArray<IntegralComponent> {
    const array = new ComponentArray(IntegralComponent.u8(), { minCount, maxCount });
    for (const value of values) {
        array.add(IntegralComponent.u8(value));
    }
    return array;
}

function values(array: ComponentArray<IntegralComponent>): number[] {
    return array.toArray().map((element) => element.get());
}

describe('ComponentArray', () => {
    describe('count bounds', () => {
        it('encodes the count relative to minCount', () => {
            const array = u8Array([10, 20, 30], 2, 4);
            const stream = new BitStream();

            expect(array.size()).toBe(26);
            expect(array.write(stream)).toBe(26);
            expect(describeBits(stream.toUint8Array(), 2)).toBe('01');

            const target = new ComponentArray(IntegralComponent.u8(), { minCount: 2, maxCount: 4 });
            expect(target.read(stream)).toBe(26);
            expect(values(target)).toEqual([10, 20, 30]);
        });

        it('refuses to write more elements than maxCount', () => {
            const array = u8Array([1, 2, 3, 4, 5], 2, 4);
            const stream = new BitStream();

            let caught: unknown;
            try {
                array.write(stream);
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(CountOutOfBoundsError);
            expect(caught).toMatchObject({ count: 5, minCount: 2, maxCount: 4 });
            expect(stream.bitsWritten).toBe(0);
        });

        it('refuses to write fewer elements than minCount', () => {
            expect(() => u8Array([1], 2, 4).write(new BitStream())).toThrow(CountOutOfBoundsError);
        });

        it('rejects a decoded count above maxCount and keeps its elements', () => {
            const stream = new BitStream();
            stream.writeBits(3, 2);

            const target = u8Array([7, 8], 2, 4);
            expect(() => target.read(stream)).toThrow(CountOutOfBoundsError);
            expect(values(target)).toEqual([7, 8]);
        });

        it('uses a 16-bit count by default', () => {
            const array = new ComponentArray(IntegralComponent.u8());
            expect(array.getMinCount()).toBe(0);
            expect(array.getMaxCount()).toBe(65535);
            expect(array.size()).toBe(16);
        });

        it('has no count bits when the count is fixed', () => {
            expect(u8Array([1, 2], 2, 2).size()).toBe(16);
        });

        it('rejects inverted bounds', () => {
            expect(() => new ComponentArray(IntegralComponent.u8(), { minCount: 5, maxCount: 1 }))
                .toThrow(ConfigurationError);
        });
    });

    describe('elements', () => {
        it('adds clones of the prototype', () => {
            const prototype = IntegralComponent.u8(5);
            const array = new ComponentArray(prototype);
            prototype.set(9);

            const first = array.add();
            expect(first.get()).toBe(5);
            expect(first).not.toBe(prototype);
            expect(array.length).toBe(1);
        });

        it('rejects elements of another class', () => {
            const array = new ComponentArray<MessageComponent>(IntegralComponent.u8());
            expect(() => array.add(new StringComponent('x'))).toThrow(
                'Array elements must match the IntegralComponent prototype, got StringComponent'
            );
            expect(() => array.add(new StringComponent('x'))).toThrow(InvalidValueError);
            expect(array.length).toBe(0);
        });

        it('rejects elements whose wire layout differs from the prototype', () => {
            const bytes = new ComponentArray(IntegralComponent.u8());
            expect(() => bytes.add(IntegralComponent.u32(70000))).toThrow(InvalidValueError);
            expect(() => bytes.add(IntegralComponent.s8())).toThrow(InvalidValueError);
            expect(() => bytes.add(IntegralComponent.u8(1, 4))).toThrow(InvalidValueError);

            const teams = new ComponentArray(new RangeComponent(0, 0, 3));
            expect(() => teams.add(new RangeComponent(2, 0, 1000))).toThrow(InvalidValueError);
            teams.add(new RangeComponent(2, 0, 3));

            const flags = new ComponentArray(new BitFieldComponent(4));
            expect(() => flags.add(new BitFieldComponent(5))).toThrow(InvalidValueError);

            expect(bytes.length).toBe(0);
            expect(teams.length).toBe(1);
            expect(flags.length).toBe(0);
        });

        it('compares nested arrays by bounds and element layout', () => {
            const rows = new ComponentArray(new ComponentArray(IntegralComponent.u8(), { maxCount: 4 }));
            expect(() => rows.add(new ComponentArray(IntegralComponent.u8(), { maxCount: 5 })))
                .toThrow(InvalidValueError);
            expect(() => rows.add(new ComponentArray(IntegralComponent.u16(), { maxCount: 4 })))
                .toThrow(InvalidValueError);

            const row = rows.add(new ComponentArray(IntegralComponent.u8(), { maxCount: 4 }));
            row.add(IntegralComponent.u8(7));
            expect(rows.length).toBe(1);
        });

        it('ignores values and names when matching the prototype', () => {
            const array = new ComponentArray(IntegralComponent.u16(1));
            const element = array.add(named('other', IntegralComponent.u16(500)));
            expect(element.get()).toBe(500);
        });

        it('tracks element width changes in its size', () => {
            const array = new ComponentArray(new StringComponent());
            const text = array.add();
            expect(array.size()).toBe(24);

            text.set('ab');
            expect(array.size()).toBe(40);
        });

        it('lets an element belong to only one array at a time', () => {
            const first = new ComponentArray(IntegralComponent.u8());
            const second = new ComponentArray(IntegralComponent.u8());
            const element = first.add(IntegralComponent.u8(3));

            expect(() => second.add(element)).toThrow(OwnershipError);

            expect(first.remove(0)).toBe(element);
            expect(element.isOwned).toBe(false);
            second.add(element);
            expect(second.at(0)).toBe(element);
        });

        it('returns undefined when removing a missing index', () => {
            expect(u8Array([1]).remove(4)).toBeUndefined();
        });

        it('iterates in insertion order', () => {
            const array = u8Array([4, 5, 6]);
            const seen: number[] = [];
            for (const element of array) {
                seen.push(element.get());
            }
            expect(seen).toEqual([4, 5, 6]);
        });

        it('clear drops every element and releases them', () => {
            const array = u8Array([1, 2]);
            const element = array.at(0);
            array.clear();
            expect(array.length).toBe(0);
            expect(array.size()).toBe(16);
            expect(element?.isOwned).toBe(false);
        });
    });

    describe('wire round-trip', () => {
        it('replaces the previous contents on read', () => {
            const target = u8Array([99]);
            const { written, read } = roundTrip(u8Array([1, 2, 3]), target);
            expect(written).toBe(40);
            expect(read).toBe(40);
            expect(values(target)).toEqual([1, 2, 3]);
            expect(target.size()).toBe(40);
        });

        it('round-trips an empty array', () => {
            const target = u8Array([1]);
            const { written } = roundTrip(u8Array([]), target);
            expect(written).toBe(16);
            expect(target.length).toBe(0);
        });

        it('keeps its elements when the stream runs out mid-element', () => {
            const stream = new BitStream();
            u8Array([1, 2]).write(stream);
            const truncated = BitStream.from(stream.toUint8Array(), 28);

            const target = u8Array([42]);
            expect(() => target.read(truncated)).toThrow(StreamExhaustedError);
            expect(values(target)).toEqual([42]);
        });
    });

    describe('clone', () => {
        it('copies elements deeply', () => {
            const original = u8Array([1, 2], 1, 3);
            original.setFieldName('scores');
            const copy = original.clone();

            copy.at(0)?.set(50);
            copy.add();

            expect(values(original)).toEqual([1, 2]);
            expect(values(copy)).toEqual([50, 2, 0]);
            expect(copy.getFieldName()).toBe('scores');
            expect(copy.getMaxCount()).toBe(3);
            expect(copy.isOwned).toBe(false);
        });
    });
});
