// src/types/signalTypes.ts

import type { Clock } from "./marketEvents.js";

export type Signal = "BUY" | "SELL" | "HOLD";

/**
 * Values the crossover rule compared, kept for auditability.
 */
export interface CrossoverMetrics {
    fastMA: number;
    slowMA: number;
    slope: number;
    fastLen: number;
    slowLen: number;
    sampleSize: number;
}

export interface SignalVerdict {
    signal: Signal;
    rationale: string;
    computedAt: number;
    metrics?: CrossoverMetrics;
}

/**
 * Maps an ordered price sequence (oldest first) to a verdict.
 */
export type SignalFunction = (
    prices: readonly number[],
    fastLen: number,
    slowLen: number,
    clock?: Clock
) => SignalVerdict;

export interface SignalRequest {
    instrument: string;
    timeframeSeconds: number;
    expirationSeconds: number;
}

/**
 * Which acquisition path produced the window a report was computed from.
 */
export type PriceSource = "cache" | "snapshot" | "none";

export interface SignalReport extends SignalVerdict, SignalRequest {
    lastPrice: number | null;
    requestedAt: number;
    source: PriceSource;
    correlationId: string;
}
