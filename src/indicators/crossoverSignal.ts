// src/indicators/crossoverSignal.ts

import { FinancialMath } from "../utils/financialMath.js";
import { systemClock } from "../types/marketEvents.js";
import type { Clock } from "../types/marketEvents.js";
import type {
    CrossoverMetrics,
    SignalFunction,
    SignalVerdict,
} from "../types/signalTypes.js";

export const INSUFFICIENT_DATA = "insufficient data";

/** Slope needs p[-1] and p[-3]. */
const MIN_SAMPLES = 3;

const MA_DECIMALS = 5;
const SLOPE_DECIMALS = 6;

/**
 * Moving-average crossover with a momentum filter.
 *
 * fastMA and slowMA are plain means over the last `fastLen` / `slowLen`
 * prices; slowMA falls back to the mean of everything available. The slope is
 * the two-step centered difference `(p[-1] - p[-3]) / 2`.
 *
 * Decision order, first match wins:
 *  - fastMA > slowMA and slope > 0  -> BUY
 *  - fastMA < slowMA and slope < 0  -> SELL
 *  - otherwise                      -> HOLD
 */
export const computeSignal: SignalFunction = (
    prices: readonly number[],
    fastLen: number,
    slowLen: number,
    clock: Clock = systemClock
): SignalVerdict => {
    const computedAt = clock();
    const last = prices.at(-1);
    const thirdLast = prices.at(-3);

    if (
        prices.length < Math.max(fastLen, slowLen, MIN_SAMPLES) ||
        last === undefined ||
        thirdLast === undefined
    ) {
        return { signal: "HOLD", rationale: INSUFFICIENT_DATA, computedAt };
    }

    const metrics: CrossoverMetrics = {
        fastMA: FinancialMath.calculateTailMean(prices, fastLen),
        slowMA: FinancialMath.calculateTailMean(prices, slowLen),
        slope: (last - thirdLast) / 2,
        fastLen,
        slowLen,
        sampleSize: prices.length,
    };
    const { fastMA, slowMA, slope } = metrics;

    if (fastMA > slowMA && slope > 0) {
        return {
            signal: "BUY",
            rationale: `fastMA ${fmtMA(fastMA)} > slowMA ${fmtMA(slowMA)}, slope ${fmtSlope(slope)}`,
            computedAt,
            metrics,
        };
    }
    if (fastMA < slowMA && slope < 0) {
        return {
            signal: "SELL",
            rationale: `fastMA ${fmtMA(fastMA)} < slowMA ${fmtMA(slowMA)}, slope ${fmtSlope(slope)}`,
            computedAt,
            metrics,
        };
    }
    return {
        signal: "HOLD",
        rationale: `fastMA ${fmtMA(fastMA)}, slowMA ${fmtMA(slowMA)}, slope ${fmtSlope(slope)}`,
        computedAt,
        metrics,
    };
};

function fmtMA(value: number): string {
    return FinancialMath.formatFixed(value, MA_DECIMALS);
}

function fmtSlope(value: number): string {
    return FinancialMath.formatFixed(value, SLOPE_DECIMALS);
}

/**
 * Window lengths scale with the requested timeframe.
 */
export function crossoverLengths(timeframeSeconds: number): {
    fastLen: number;
    slowLen: number;
} {
    return {
        fastLen: Math.max(3, Math.floor(timeframeSeconds / 6)),
        slowLen: Math.max(8, Math.floor(timeframeSeconds / 2)),
    };
}
