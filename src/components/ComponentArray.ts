/**
 * @file ComponentArray.ts
 * @brief Variable-length list of same-typed components behind a count prefix.
 *
 * Wire form: the element count as a range-bounded integer over
 * `[minCount, maxCount]`, then every element back to back. The wire carries no
 * per-element type, so the array keeps an explicit prototype and clones it
 * once per slot when reading.
 *
 * Count bounds are checked at the wire boundary (`read` and `write`), which
 * lets an array be filled one element at a time.
 *
 * @example
 * ```typescript
 * const scores = new ComponentArray(IntegralComponent.u16(), { maxCount: 16 });
 * scores.add().set(120);
 * scores.add(IntegralComponent.u16(95));
 * scores.write(stream);
 * ```
 */

import { MessageComponent } from './MessageComponent';
import { RangeComponent } from './RangeComponent';
import { ArrayOptionsSchema, parseOptions } from '../config';
import type { ArrayOptions } from '../config';
import { CountOutOfBoundsError, InvalidValueError, ValueOutOfRangeError } from '../errors';
import type { BitReader, BitWriter } from '../types';

/** A component whose `clone()` returns its own type. */
export type SelfCloning<T> = { clone(): T } & MessageComponent;

export class ComponentArray<T extends SelfCloning<T> = MessageComponent> extends MessageComponent {
    private readonly prototype: T;
    private readonly minCount: number;
    private readonly maxCount: number;
    private readonly countField: RangeComponent;
    private items: T[] = [];

    constructor(prototype: T, options: ArrayOptions = {}) {
        super();
        const { minCount, maxCount } = parseOptions(ArrayOptionsSchema, options, 'array options');
        this.prototype = prototype.clone();
        this.minCount = minCount;
        this.maxCount = maxCount;
        this.countField = new RangeComponent(0, minCount, maxCount);
    }

    get length(): number {
        return this.items.length;
    }

    getMinCount(): number {
        return this.minCount;
    }

    getMaxCount(): number {
        return this.maxCount;
    }

    at(index: number): T | undefined {
        return this.items[index];
    }

    /**
     * Appends `component`, or a fresh clone of the prototype when omitted.
     * @returns The appended element
     * @throws {InvalidValueError} If `component`'s wire layout differs from the prototype's
     */
    add(component?: T): T {
        const element = component ?? this.prototype.clone();
        if (!this.prototype.sameShape(element)) {
            throw new InvalidValueError(
                `Array elements must match the ${this.prototype.constructor.name} prototype, got ${element.constructor.name}`
            );
        }
        element.attachTo(this);
        this.items.push(element);
        this.structureChanged();
        return element;
    }

    /**
     * Removes and releases the element at `index`.
     */
    remove(index: number): T | undefined {
        const [removed] = this.items.splice(index, 1);
        if (removed === undefined) return undefined;
        removed.detach();
        this.structureChanged();
        return removed;
    }

    toArray(): T[] {
        return this.items.slice();
    }

    [Symbol.iterator](): IterableIterator<T> {
        return this.items[Symbol.iterator]();
    }

    /** Drops every element. */
    clear(): void {
        for (const item of this.items) item.detach();
        this.items = [];
        this.structureChanged();
    }

    read(stream: BitReader): number {
        const counter = this.countField.clone();
        let bits: number;
        try {
            bits = counter.read(stream);
        } catch (error) {
            if (error instanceof ValueOutOfRangeError) {
                throw new CountOutOfBoundsError(error.value, this.minCount, this.maxCount);
            }
            throw error;
        }

        const next: T[] = [];
        for (let i = 0; i < counter.get(); i++) {
            const element = this.prototype.clone();
            bits += element.read(stream);
            next.push(element);
        }

        for (const item of this.items) item.detach();
        for (const element of next) element.attachTo(this);
        this.items = next;
        this.structureChanged();
        return bits;
    }

    write(stream: BitWriter): number {
        const count = this.items.length;
        if (count < this.minCount || count > this.maxCount) {
            throw new CountOutOfBoundsError(count, this.minCount, this.maxCount);
        }
        let bits = this.countField.write(stream);
        for (const item of this.items) {
            bits += item.write(stream);
        }
        return bits;
    }

    clone(): ComponentArray<T> {
        const copy = new ComponentArray<T>(this.prototype, {
            minCount: this.minCount,
            maxCount: this.maxCount,
        });
        for (const item of this.items) {
            copy.add(item.clone());
        }
        return this.copyNameTo(copy);
    }

    sameShape(other: MessageComponent): boolean {
        return super.sameShape(other)
            && other instanceof ComponentArray
            && other.minCount === this.minCount
            && other.maxCount === this.maxCount
            && this.prototype.sameShape(other.prototype);
    }

    protected measure(): number {
        let bits = this.countField.size();
        for (const item of this.items) {
            bits += item.size();
        }
        return bits;
    }

    private structureChanged(): void {
        this.countField.set(this.items.length);
        this.invalidate();
    }
}
