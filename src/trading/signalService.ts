// src/trading/signalService.ts

import { randomUUID } from "crypto";
import { DataAcquisitionError } from "../core/errors.js";
import { computeSignal, crossoverLengths } from "../indicators/crossoverSignal.js";
import { assertPositiveSeconds } from "../utils/duration.js";
import { systemClock } from "../types/marketEvents.js";
import type { Clock } from "../types/marketEvents.js";
import type { TickStore } from "../market/tickStore.js";
import type { SnapshotFetcher } from "./snapshotFetcher.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type {
    PriceSource,
    SignalFunction,
    SignalReport,
    SignalRequest,
    SignalVerdict,
} from "../types/signalTypes.js";

export const FAILED_TO_RETRIEVE = "failed to retrieve data";
export const NO_RECENT_PRICES = "no recent prices";

const LOOKBACK_MULTIPLIER = 3;
const MIN_CACHED_POINTS = 10;
const MIN_SNAPSHOT_SECONDS = 5;
const MAX_SNAPSHOT_SECONDS = 10;

export interface SignalServiceOptions {
    signalFunction?: SignalFunction;
    clock?: Clock;
}

/**
 * Entry point for signal requests: reuses cached history when it is deep
 * enough, otherwise backfills it with a snapshot fetch before computing.
 */
export class SignalService {
    private readonly signalFunction: SignalFunction;
    private readonly clock: Clock;

    constructor(
        private readonly store: TickStore,
        private readonly fetcher: SnapshotFetcher,
        private readonly logger: ILogger,
        private readonly metricsCollector: IMetricsCollector,
        options: SignalServiceOptions = {}
    ) {
        this.signalFunction = options.signalFunction ?? computeSignal;
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Throws InvalidDurationError for non-positive or fractional durations.
     * Acquisition faults never escape: they become a HOLD verdict.
     */
    public async requestSignal(
        instrument: string,
        timeframeSeconds: number,
        expirationSeconds: number
    ): Promise<SignalReport> {
        assertPositiveSeconds(timeframeSeconds);
        assertPositiveSeconds(expirationSeconds);

        const request: SignalRequest = { instrument, timeframeSeconds, expirationSeconds };
        const correlationId = randomUUID();
        const requestedAt = this.clock();
        this.metricsCollector.incrementCounter("signals.requested");

        const lookback = LOOKBACK_MULTIPLIER * timeframeSeconds;
        const minPoints = Math.max(MIN_CACHED_POINTS, timeframeSeconds);
        let source: PriceSource = "cache";

        const cached = this.store.pricesSince(instrument, lookback).length;
        if (cached < minPoints) {
            const duration = Math.min(
                MAX_SNAPSHOT_SECONDS,
                Math.max(MIN_SNAPSHOT_SECONDS, timeframeSeconds)
            );
            this.logger.info(
                "Not enough cached ticks, fetching snapshot",
                { instrument, cached, required: minPoints, duration },
                correlationId
            );
            try {
                await this.fetcher.fetch(instrument, duration, { correlationId });
            } catch (error) {
                if (!(error instanceof DataAcquisitionError)) throw error;
                this.logger.warn(
                    "Snapshot fetch failed, holding",
                    { instrument, error },
                    correlationId
                );
                return this.finish(
                    this.hold(FAILED_TO_RETRIEVE),
                    request,
                    null,
                    requestedAt,
                    "none",
                    correlationId
                );
            }
            source = "snapshot";
            this.logger.debug(
                "Lookback window after snapshot",
                { instrument, points: this.store.pricesSince(instrument, lookback).length },
                correlationId
            );
        }

        const window = this.store.pricesSince(instrument, timeframeSeconds);
        const lastPrice = window.at(-1);
        if (lastPrice === undefined) {
            return this.finish(
                this.hold(NO_RECENT_PRICES),
                request,
                null,
                requestedAt,
                "none",
                correlationId
            );
        }

        const { fastLen, slowLen } = crossoverLengths(timeframeSeconds);
        const verdict = this.signalFunction(window, fastLen, slowLen, this.clock);
        return this.finish(verdict, request, lastPrice, requestedAt, source, correlationId);
    }

    private hold(rationale: string): SignalVerdict {
        return { signal: "HOLD", rationale, computedAt: this.clock() };
    }

    private finish(
        verdict: SignalVerdict,
        request: SignalRequest,
        lastPrice: number | null,
        requestedAt: number,
        source: PriceSource,
        correlationId: string
    ): SignalReport {
        this.metricsCollector.incrementCounter(`signals.${verdict.signal.toLowerCase()}`);
        this.logger.info(
            "Signal computed",
            {
                instrument: request.instrument,
                signal: verdict.signal,
                rationale: verdict.rationale,
                source,
            },
            correlationId
        );
        return {
            ...verdict,
            ...request,
            lastPrice,
            requestedAt,
            source,
            correlationId,
        };
    }
}
