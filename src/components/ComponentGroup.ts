/**
 * @file ComponentGroup.ts
 * @brief Named collection of required and optional sub-components.
 *
 * Wire form: a presence bit-field with one bit per optional field (in
 * declaration order), then every required field in declaration order, then
 * only the optional fields whose presence bit is set.
 *
 * Presence records whether an optional field was supplied or read; it is never
 * inferred from the field's value. An absent field keeps its last value in
 * memory but costs no bits on the wire.
 *
 * Names are indexed when a field is added. The index maps a name to a position
 * in one of the two owned sequences and is rebuilt whenever a field is removed
 * or renamed. Adding a second field under an existing name shadows the first in
 * lookups.
 *
 * `read` decodes into a staged copy first; a failed read leaves the group,
 * presence included, as it was.
 *
 * @example
 * ```typescript
 * const player = new ComponentGroup();
 * player.addField(named('id', IntegralComponent.u8(7)));
 * player.addField(named('name', new StringComponent()), true);
 *
 * player.getFieldAs('name', StringComponent)?.set('doomguy');
 * player.setPresent('name');
 * player.write(stream);
 * ```
 */

import { MessageComponent } from './MessageComponent';
import { BitFieldComponent } from './BitFieldComponent';
import { InvalidValueError, UnknownFieldError } from '../errors';
import type { BitReader, BitWriter } from '../types';
import { BitStream } from '../stream/BitStream';
import { logger as rootLogger } from '../utils/Logger';

const logger = rootLogger.child('ComponentGroup');

/** Where a named field lives: which sequence, and at what position. */
interface FieldSlot {
    optional: boolean;
    index: number;
}

/** A field in the order it was added. */
interface FieldEntry {
    component: MessageComponent;
    optional: boolean;
}

/**
 * Sets `component`'s field name and returns it, for building groups inline.
 */
export function named<C extends MessageComponent>(name: string, component: C): C {
    component.setFieldName(name);
    return component;
}

export class ComponentGroup extends MessageComponent {
    private required: MessageComponent[] = [];
    private optional: MessageComponent[] = [];
    private entries: FieldEntry[] = [];
    private readonly presence = new BitFieldComponent(0);
    private nameTable = new Map<string, FieldSlot>();

    constructor() {
        super();
        this.presence.attachTo(this);
    }

    /**
     * Registers `component` as a required or optional field. Optional fields
     * start absent.
     *
     * @returns The added component
     * @throws {OwnershipError} If `component` already belongs to a composite
     */
    addField<C extends MessageComponent>(component: C, optional: boolean = false): C {
        return this.register(component, optional);
    }

    /**
     * Removes and releases the field registered under `name`.
     *
     * @returns The removed component, or `undefined` if no field has that name
     */
    removeField(name: string): MessageComponent | undefined {
        const slot = this.nameTable.get(name);
        if (slot === undefined) return undefined;

        const sequence = slot.optional ? this.optional : this.required;
        const [removed] = sequence.splice(slot.index, 1);
        if (slot.optional) {
            this.presence.removeFlag(slot.index);
        }
        this.entries = this.entries.filter((entry) => entry.component !== removed);
        removed.detach();

        this.rebuildNameTable();
        this.invalidate();
        return removed;
    }

    /** Whether a field is registered under `name`, present or not. */
    hasField(name: string): boolean {
        return this.nameTable.has(name);
    }

    /** The field registered under `name`, or `undefined`. */
    getField(name: string): MessageComponent | undefined {
        const slot = this.nameTable.get(name);
        if (slot === undefined) return undefined;
        return slot.optional ? this.optional[slot.index] : this.required[slot.index];
    }

    /**
     * The field registered under `name` if it is an instance of `type`.
     */
    getFieldAs<C extends MessageComponent>(
        name: string,
        type: abstract new (...args: never[]) => C
    ): C | undefined {
        const field = this.getField(name);
        return field instanceof type ? field : undefined;
    }

    /**
     * Whether the named field will be written. Required fields are always
     * present; unknown names are not.
     */
    isPresent(name: string): boolean {
        const slot = this.nameTable.get(name);
        if (slot === undefined) return false;
        return slot.optional ? this.presence.getFlag(slot.index) : true;
    }

    /**
     * Marks an optional field as supplied (or not).
     *
     * @throws {UnknownFieldError} If no field has that name
     * @throws {InvalidValueError} If asked to mark a required field absent
     */
    setPresent(name: string, present: boolean = true): void {
        const slot = this.nameTable.get(name);
        if (slot === undefined) {
            throw new UnknownFieldError(name);
        }
        if (!slot.optional) {
            if (!present) {
                throw new InvalidValueError(`Required field "${name}" cannot be absent`);
            }
            return;
        }
        if (this.presence.getFlag(slot.index) !== present) {
            this.presence.setFlag(slot.index, present);
            this.invalidate();
        }
    }

    get fieldCount(): number {
        return this.required.length + this.optional.length;
    }

    requiredFields(): MessageComponent[] {
        return this.required.slice();
    }

    optionalFields(): MessageComponent[] {
        return this.optional.slice();
    }

    /** Clears every field and marks all optional fields absent. */
    clear(): void {
        for (const field of this.required) field.clear();
        for (const field of this.optional) field.clear();
        this.presence.clear();
        this.invalidate();
    }

    read(stream: BitReader): number {
        const staged = this.clone();
        const bits = staged.readFields(stream);

        // Replay into the live fields so references callers hold stay valid.
        const bytes = Math.max(1, Math.ceil(bits / 8));
        const replay = new BitStream({ initialCapacity: bytes, maxCapacity: bytes });
        staged.write(replay);
        this.readFields(replay);
        return bits;
    }

    write(stream: BitWriter): number {
        let bits = this.presence.write(stream);
        for (const field of this.required) {
            bits += field.write(stream);
        }
        this.optional.forEach((field, i) => {
            if (this.presence.getFlag(i)) {
                bits += field.write(stream);
            }
        });
        return bits;
    }

    clone(): ComponentGroup {
        const copy = new ComponentGroup();
        for (const entry of this.entries) {
            copy.register(entry.component.clone(), entry.optional, false);
        }
        copy.presence.set(this.presence.get());
        return this.copyNameTo(copy);
    }

    /** Same field kinds and optionality, in the same order. */
    sameShape(other: MessageComponent): boolean {
        if (!super.sameShape(other) || !(other instanceof ComponentGroup)) return false;
        if (other.entries.length !== this.entries.length) return false;
        return this.entries.every((entry, i) => {
            const theirs = other.entries[i];
            return entry.optional === theirs.optional && entry.component.sameShape(theirs.component);
        });
    }

    protected childRenamed(): void {
        this.rebuildNameTable();
    }

    protected measure(): number {
        let bits = this.presence.size();
        for (const field of this.required) {
            bits += field.size();
        }
        this.optional.forEach((field, i) => {
            if (this.presence.getFlag(i)) {
                bits += field.size();
            }
        });
        return bits;
    }

    private readFields(stream: BitReader): number {
        let bits = this.presence.read(stream);
        this.invalidate();

        for (const field of this.required) {
            bits += field.read(stream);
        }
        this.optional.forEach((field, i) => {
            if (this.presence.getFlag(i)) {
                bits += field.read(stream);
            }
        });
        return bits;
    }

    private register<C extends MessageComponent>(component: C, optional: boolean, warnOnShadow = true): C {
        component.attachTo(this);
        const sequence = optional ? this.optional : this.required;
        sequence.push(component);
        if (optional) {
            this.presence.resize(this.optional.length);
        }
        this.entries.push({ component, optional });

        const name = component.getFieldName();
        if (name !== '') {
            if (warnOnShadow && this.nameTable.has(name)) {
                logger.warn(`Duplicate field name "${name}" shadows an earlier field`);
            }
            this.nameTable.set(name, { optional, index: sequence.length - 1 });
        }

        this.invalidate();
        return component;
    }

    private rebuildNameTable(): void {
        const table = new Map<string, FieldSlot>();
        let requiredIndex = 0;
        let optionalIndex = 0;
        for (const entry of this.entries) {
            const index = entry.optional ? optionalIndex++ : requiredIndex++;
            const name = entry.component.getFieldName();
            if (name !== '') {
                table.set(name, { optional: entry.optional, index });
            }
        }
        this.nameTable = table;
    }
}
