/**
 * @file Message.ts
 * @brief Tags a component tree with a message type.
 *
 * A message is itself a component: its wire form is its payload group. The
 * base class has an empty payload, so a plain `Message` measures, reads and
 * writes zero bits. Concrete messages add their fields in the constructor and
 * must override `clone()` to rebuild their own class around
 * `clonePayload()`; the base `clone()` refuses to copy a subclass.
 *
 * @example
 * ```typescript
 * class ChatMessage extends Message {
 *     constructor(payload?: ComponentGroup) {
 *         super(MessageType.Chat, payload);
 *         if (!payload) this.addField(named('text', new StringComponent()));
 *     }
 *
 *     clone(): ChatMessage {
 *         return this.copyNameTo(new ChatMessage(this.clonePayload()));
 *     }
 * }
 * ```
 */

import { MessageComponent } from '../components/MessageComponent';
import { ComponentGroup } from '../components/ComponentGroup';
import { InvalidValueError } from '../errors';
import type { BitReader, BitWriter } from '../types';

/**
 * Message type identifiers. The numeric values are wire constants and must
 * never change.
 */
export enum MessageType {
    /** Does nothing. */
    NoOp = 0,
    Replication = 1,
    Ticcmd = 2,
    LoadMap = 10,
    ClientStatus = 11,
    Chat = 20,
    Obituary = 21,
}

export class Message extends MessageComponent {
    protected readonly payload: ComponentGroup;

    constructor(private readonly messageType: MessageType = MessageType.NoOp, payload?: ComponentGroup) {
        super();
        this.payload = payload ?? new ComponentGroup();
        this.payload.attachTo(this);
    }

    getMessageType(): MessageType {
        return this.messageType;
    }

    hasField(name: string): boolean {
        return this.payload.hasField(name);
    }

    getField(name: string): MessageComponent | undefined {
        return this.payload.getField(name);
    }

    getFieldAs<C extends MessageComponent>(
        name: string,
        type: abstract new (...args: never[]) => C
    ): C | undefined {
        return this.payload.getFieldAs(name, type);
    }

    isPresent(name: string): boolean {
        return this.payload.isPresent(name);
    }

    setPresent(name: string, present: boolean = true): void {
        this.payload.setPresent(name, present);
    }

    clear(): void {
        this.payload.clear();
    }

    read(stream: BitReader): number {
        return this.payload.read(stream);
    }

    write(stream: BitWriter): number {
        return this.payload.write(stream);
    }

    /**
     * @throws {InvalidValueError} If called on a subclass that does not override it
     */
    clone(): Message {
        if (Object.getPrototypeOf(this) !== Message.prototype) {
            throw new InvalidValueError(`${this.constructor.name} must override clone()`);
        }
        return this.copyNameTo(new Message(this.messageType, this.clonePayload()));
    }

    protected addField<C extends MessageComponent>(component: C, optional: boolean = false): C {
        return this.payload.addField(component, optional);
    }

    /** Deep copy of the payload, for subclasses building their clone. */
    protected clonePayload(): ComponentGroup {
        return this.payload.clone();
    }

    sameShape(other: MessageComponent): boolean {
        return super.sameShape(other)
            && other instanceof Message
            && other.messageType === this.messageType
            && this.payload.sameShape(other.payload);
    }

    protected measure(): number {
        return this.payload.size();
    }
}
