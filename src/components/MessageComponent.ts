/**
 * @file MessageComponent.ts
 * @brief The one interface shared by every leaf and composite component.
 *
 * A component knows how many bits it occupies, how to reset itself, how to
 * read and write itself, and how to make an independent deep copy. Composites
 * implement the same contract by delegating to their children, so a whole
 * message is read or written with a single call on its root.
 *
 * Size caching: `size()` is memoized here. A component whose width depends on
 * its state calls {@link MessageComponent.invalidate} whenever that state
 * changes; invalidation climbs to the owning composite so cached totals higher
 * in the tree are dropped too. Constant-width components never invalidate.
 */

import { OwnershipError } from '../errors';
import type { BitReader, BitWriter } from '../types';

export abstract class MessageComponent {
    private fieldName: string = '';
    private cachedSize: number | undefined;
    private owner: MessageComponent | undefined;

    getFieldName(): string {
        return this.fieldName;
    }

    /** Renames this component; an owning group re-indexes its lookups. */
    setFieldName(name: string): void {
        if (name === this.fieldName) return;
        this.fieldName = name;
        this.owner?.childRenamed(this);
    }

    /** Exact number of bits {@link write} emits for the current value. */
    size(): number {
        if (this.cachedSize === undefined) {
            this.cachedSize = this.measure();
        }
        return this.cachedSize;
    }

    /** Resets to the canonical default value. */
    abstract clear(): void;

    /** Decodes from `stream`; returns the number of bits consumed. */
    abstract read(stream: BitReader): number;

    /** Encodes to `stream` without changing state; returns the number of bits emitted. */
    abstract write(stream: BitWriter): number;

    /** Independent deep copy carrying the same field name and value, with no owner. */
    abstract clone(): MessageComponent;

    /** Computes the encoded width; result is cached by {@link size}. */
    protected abstract measure(): number;

    /** Whether an array or group currently owns this component. */
    get isOwned(): boolean {
        return this.owner !== undefined;
    }

    /** Called on the owner after one of its children has been renamed. */
    protected childRenamed(_child: MessageComponent): void { }

    /**
     * Drops the cached size here and in every owning ancestor.
     */
    protected invalidate(): void {
        for (let node: MessageComponent | undefined = this; node; node = node.owner) {
            node.cachedSize = undefined;
        }
    }

    /**
     * Records `owner` as this component's single owner.
     * @internal Called by composites when they take a child.
     */
    attachTo(owner: MessageComponent): void {
        if (this.owner !== undefined) {
            throw new OwnershipError(
                `Component "${this.fieldName}" already belongs to another composite`
            );
        }
        this.owner = owner;
    }

    /**
     * Releases this component from its owner.
     * @internal Called by composites when they drop a child.
     */
    detach(): void {
        this.owner = undefined;
    }

    /**
     * Whether `other` has this component's wire layout, so that bits written
     * by one can be read by the other. Values and field names are ignored.
     * Components whose layout carries parameters (widths, bounds, children)
     * extend this check.
     */
    sameShape(other: MessageComponent): boolean {
        return Object.getPrototypeOf(other) === Object.getPrototypeOf(this);
    }

    /**
     * Copies the field name onto a freshly built clone.
     */
    protected copyNameTo<T extends MessageComponent>(clone: T): T {
        clone.setFieldName(this.fieldName);
        return clone;
    }
}
