// src/core/errors.ts

/**
 * Custom error types for the signal desk
 */

export class InvalidPriceError extends Error {
    constructor(
        message: string,
        public readonly instrument: string,
        public readonly rawPrice: unknown
    ) {
        super(message);
        this.name = "InvalidPriceError";
    }
}

export class InvalidDurationError extends Error {
    constructor(
        message: string,
        public readonly input: string | number
    ) {
        super(message);
        this.name = "InvalidDurationError";
    }
}

/**
 * Raised by a snapshot fetch when the provider could not be opened,
 * subscribed or read. Callers downgrade it to a HOLD verdict.
 */
export class DataAcquisitionError extends Error {
    constructor(
        message: string,
        public readonly instrument: string,
        public readonly correlationId?: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = "DataAcquisitionError";
    }
}

export class ConnectionError extends Error {
    constructor(
        message: string,
        public readonly service: string,
        public readonly correlationId?: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = "ConnectionError";
    }
}

export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message);
        this.name = "ConfigError";
    }
}

/**
 * Normalizes anything thrown into an Error instance.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
