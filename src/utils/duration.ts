// src/utils/duration.ts

import { InvalidDurationError } from "../core/errors.js";

const UNIT_SECONDS = {
    s: 1,
    m: 60,
    h: 3600,
} as const;

const DURATION_PATTERN = /^(\d+)([smh])$/;

/**
 * Parses a compact duration such as "15s", "1m" or "2h" into whole seconds.
 */
export function parseDuration(input: string): number {
    const match = DURATION_PATTERN.exec(input.trim());
    const magnitude = match?.[1];
    const unit = match?.[2];
    if (magnitude === undefined || !isDurationUnit(unit)) {
        throw new InvalidDurationError(
            `Invalid duration "${input}", use e.g. 30s, 1m, 1h`,
            input
        );
    }

    const seconds = Number.parseInt(magnitude, 10) * UNIT_SECONDS[unit];
    assertPositiveSeconds(seconds, input);
    return seconds;
}

/**
 * Durations handed to the signal path must be positive whole seconds.
 */
export function assertPositiveSeconds(
    seconds: number,
    input: string | number = seconds
): void {
    if (!Number.isSafeInteger(seconds) || seconds <= 0) {
        throw new InvalidDurationError(
            `Duration must be a positive whole number of seconds, got ${String(input)}`,
            input
        );
    }
}

function isDurationUnit(unit: string | undefined): unit is keyof typeof UNIT_SECONDS {
    return unit !== undefined && unit in UNIT_SECONDS;
}
