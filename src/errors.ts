/**
 * Error types for bitframe.
 *
 * Every failure a component tree can raise is a typed subclass of
 * {@link BitframeError}, so callers can branch on `instanceof` or on `code`.
 * Errors raised by a leaf propagate unchanged through every composite above it.
 */

/**
 * Base class for all bitframe errors.
 */
export class BitframeError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'BitframeError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, BitframeError);
        }
    }
}

/**
 * Thrown when options handed to a constructor are invalid.
 */
export class ConfigurationError extends BitframeError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when a read asks for more bits than the stream still holds.
 * The read position is left where it was before the failed call.
 */
export class StreamExhaustedError extends BitframeError {
    constructor(
        public readonly requested: number,
        public readonly available: number
    ) {
        super(
            `Stream exhausted: requested ${requested} bits, ${available} available`,
            'STREAM_EXHAUSTED'
        );
        this.name = 'StreamExhaustedError';
    }
}

/**
 * Thrown when a write would grow the stream past its configured capacity.
 */
export class StreamOverflowError extends BitframeError {
    constructor(public readonly maxCapacity: number) {
        super(
            `Stream exceeded maximum capacity of ${maxCapacity} bytes`,
            'STREAM_OVERFLOW'
        );
        this.name = 'StreamOverflowError';
    }
}

/**
 * Thrown when a range-bounded integer lies outside its bounds, either when it
 * is written or after it is decoded.
 */
export class ValueOutOfRangeError extends BitframeError {
    constructor(
        public readonly value: number,
        public readonly lowerBound: number,
        public readonly upperBound: number
    ) {
        super(
            `Value ${value} outside range [${lowerBound}, ${upperBound}]`,
            'VALUE_OUT_OF_RANGE'
        );
        this.name = 'ValueOutOfRangeError';
    }
}

/**
 * Thrown when an array's element count falls outside `[minCount, maxCount]`.
 */
export class CountOutOfBoundsError extends BitframeError {
    constructor(
        public readonly count: number,
        public readonly minCount: number,
        public readonly maxCount: number
    ) {
        super(
            `Element count ${count} outside bounds [${minCount}, ${maxCount}]`,
            'COUNT_OUT_OF_BOUNDS'
        );
        this.name = 'CountOutOfBoundsError';
    }
}

/**
 * Thrown when digest text is not exactly 32 hexadecimal digits.
 */
export class MalformedDigestError extends BitframeError {
    constructor(public readonly text: string) {
        super(`Malformed digest text: "${text}"`, 'MALFORMED_DIGEST');
        this.name = 'MalformedDigestError';
    }
}

/**
 * Thrown when an operation names a field the group does not have.
 * Plain lookups return `undefined` instead.
 */
export class UnknownFieldError extends BitframeError {
    constructor(public readonly fieldName: string) {
        super(`Unknown field "${fieldName}"`, 'UNKNOWN_FIELD');
        this.name = 'UnknownFieldError';
    }
}

/**
 * Thrown when a setter is handed a value its component cannot encode.
 */
export class InvalidValueError extends BitframeError {
    constructor(message: string) {
        super(message, 'INVALID_VALUE');
        this.name = 'InvalidValueError';
    }
}

/**
 * Thrown when a component that already has an owner is added to another
 * composite.
 */
export class OwnershipError extends BitframeError {
    constructor(message: string) {
        super(message, 'OWNERSHIP_ERROR');
        this.name = 'OwnershipError';
    }
}
