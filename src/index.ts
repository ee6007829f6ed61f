/**
 * bitframe - composable bit-level message components
 *
 * Build a message layout out of small typed components, then read or write
 * the whole tree with one call on its root.
 *
 * @example
 * ```typescript
 * import { BitStream, ComponentGroup, IntegralComponent, StringComponent, named } from 'bitframe';
 *
 * const chat = new ComponentGroup();
 * chat.addField(named('player', IntegralComponent.u8(3)));
 * chat.addField(named('text', new StringComponent('gg')));
 *
 * const stream = new BitStream();
 * chat.write(stream); // 8 + 24 bits
 * ```
 *
 * @packageDocumentation
 */

// Components
export * from './components';

// Messages
export { Message, MessageType } from './message/Message';

// Bit stream
export { BitStream } from './stream';
export type { BitReader, BitWriter, V2Fixed, V3Fixed } from './types';

// Values and helpers
export { BitField } from './utils/BitField';
export { FRACBITS, FRACUNIT, toFixed, fromFixed } from './math/fixed';
export type { Fixed } from './math/fixed';

// Errors
export {
    BitframeError,
    ConfigurationError,
    StreamExhaustedError,
    StreamOverflowError,
    ValueOutOfRangeError,
    CountOutOfBoundsError,
    MalformedDigestError,
    UnknownFieldError,
    InvalidValueError,
    OwnershipError,
} from './errors';

// Configuration and logging
export { configure, INT32_MIN, INT32_MAX } from './config';
export type { ArrayOptions, BitStreamConfig, LibraryConfig } from './config';
export { Logger, LogLevel, logger } from './utils/Logger';

// Debug Utilities (development only)
export { hexDump, describeBits, formatBits, formatBytes } from './debug';
