/**
 * @file DigestComponent.ts
 * @brief 128-bit hash value (e.g. an MD5 sum) with a hex text view.
 *
 * The raw 16 bytes travel on the wire, most significant byte first. The
 * lowercase hex rendering is cached and refreshed after `set`, `read` and
 * `clear`, so `get()` never re-encodes.
 *
 * @example
 * ```typescript
 * const wadHash = new DigestComponent('d41d8cd98f00b204e9800998ecf8427e');
 * wadHash.get(); // 'd41d8cd98f00b204e9800998ecf8427e'
 * ```
 */

import { z } from 'zod';
import { MessageComponent } from './MessageComponent';
import { MalformedDigestError } from '../errors';
import type { BitReader, BitWriter } from '../types';

export const DIGEST_BITS = 128;
const DIGEST_BYTES = DIGEST_BITS / 8;

export const DigestTextSchema = z.string().regex(/^[0-9a-fA-F]{32}$/);

export class DigestComponent extends MessageComponent {
    private bytes = new Uint8Array(DIGEST_BYTES);
    private cachedText = '';

    constructor(text?: string) {
        super();
        if (text === undefined) {
            this.cacheText();
        } else {
            this.set(text);
        }
    }

    /** Lowercase 32-character hex text. */
    get(): string {
        return this.cachedText;
    }

    /**
     * Parses 32 hex digits (either case).
     * @throws {MalformedDigestError} If `text` is not exactly 32 hex digits
     */
    set(text: string): void {
        if (!DigestTextSchema.safeParse(text).success) {
            throw new MalformedDigestError(text);
        }
        for (let i = 0; i < DIGEST_BYTES; i++) {
            this.bytes[i] = parseInt(text.slice(i * 2, i * 2 + 2), 16);
        }
        this.cacheText();
    }

    /** Copy of the raw digest bytes. */
    getBytes(): Uint8Array {
        return this.bytes.slice();
    }

    clear(): void {
        this.bytes.fill(0);
        this.cacheText();
    }

    read(stream: BitReader): number {
        const next = new Uint8Array(DIGEST_BYTES);
        for (let i = 0; i < DIGEST_BYTES; i++) {
            next[i] = stream.readBits(8);
        }
        this.bytes = next;
        this.cacheText();
        return DIGEST_BITS;
    }

    write(stream: BitWriter): number {
        for (const b of this.bytes) {
            stream.writeBits(b, 8);
        }
        return DIGEST_BITS;
    }

    clone(): DigestComponent {
        return this.copyNameTo(new DigestComponent(this.cachedText));
    }

    protected measure(): number {
        return DIGEST_BITS;
    }

    private cacheText(): void {
        this.cachedText = Array.from(this.bytes, b => b.toString(16).padStart(2, '0')).join('');
    }
}
