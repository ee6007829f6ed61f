/**
 * @file stream/index.ts
 * @brief Bit-granular buffer used by the components.
 */

export { BitStream } from './BitStream';
