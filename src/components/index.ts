/**
 * @file components/index.ts
 * @brief Leaf and composite message components.
 */

export { MessageComponent } from './MessageComponent';
export { IntegralComponent, IntegralKinds, maskBits, signExtend } from './IntegralComponent';
export type { IntegralKind, IntegralKindName } from './IntegralComponent';
export { RangeComponent, rangeBitWidth } from './RangeComponent';
export { FloatComponent } from './FloatComponent';
export { StringComponent } from './StringComponent';
export { V2FixedComponent, V3FixedComponent } from './FixedVectorComponent';
export { BitFieldComponent } from './BitFieldComponent';
export { DigestComponent, DigestTextSchema, DIGEST_BITS } from './DigestComponent';
export { ComponentArray } from './ComponentArray';
export type { SelfCloning } from './ComponentArray';
export { ComponentGroup, named } from './ComponentGroup';
