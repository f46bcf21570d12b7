// src/trading/snapshotFetcher.ts

import { randomUUID } from "crypto";
import {
    ConnectionError,
    DataAcquisitionError,
    InvalidPriceError,
    toError,
} from "../core/errors.js";
import {
    createExtractionRules,
    decodeMessage,
    describeProviderError,
    extractTick,
    providerError,
} from "../market/tickExtraction.js";
import { PROVIDER_SERVICE } from "../market/providerConnection.js";
import { forgetRequest, subscribeRequest, systemClock } from "../types/marketEvents.js";
import type { Clock, SubscribeRequest, Tick } from "../types/marketEvents.js";
import type { TickStore } from "../market/tickStore.js";
import type {
    ConnectionFactory,
    ProviderConnection,
} from "../market/providerConnection.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";

export interface SnapshotOptions {
    correlationId?: string;
    /** Stop early once this many ticks have been collected. */
    maxTicks?: number;
}

/**
 * One-shot, bounded-duration tick acquisition over a dedicated subscription.
 */
export class SnapshotFetcher {
    constructor(
        private readonly connect: ConnectionFactory,
        private readonly store: TickStore,
        private readonly logger: ILogger,
        private readonly metricsCollector: IMetricsCollector,
        private readonly clock: Clock = systemClock
    ) {}

    /**
     * Collects ticks for `instrument` until `durationSeconds` of wall-clock
     * time elapse, a receive times out or `maxTicks` is reached, forwarding
     * each into the store.
     *
     * The forget request is sent exactly once whenever the connection was
     * opened, including when collection fails. Faults, including the
     * provider rejecting the subscription, surface as DataAcquisitionError;
     * an empty result is a valid outcome.
     */
    public async fetch(
        instrument: string,
        durationSeconds: number,
        options: SnapshotOptions = {}
    ): Promise<Tick[]> {
        const correlationId = options.correlationId ?? randomUUID();
        this.metricsCollector.incrementCounter("snapshot.fetches.started");
        this.logger.info(
            "Fetching tick snapshot",
            { instrument, durationSeconds },
            correlationId
        );

        let connection: ProviderConnection;
        try {
            connection = await this.connect(correlationId);
        } catch (error) {
            this.metricsCollector.incrementCounter("snapshot.fetches.failed");
            throw new DataAcquisitionError(
                `Could not open provider connection for ${instrument}`,
                instrument,
                correlationId,
                { cause: error }
            );
        }

        const subscription = subscribeRequest(instrument);
        const collected: Tick[] = [];
        try {
            await connection.send(subscription);
            await this.collect(connection, instrument, durationSeconds, collected, {
                correlationId,
                maxTicks: options.maxTicks ?? Number.POSITIVE_INFINITY,
            });
        } catch (error) {
            this.metricsCollector.incrementCounter("snapshot.fetches.failed");
            throw new DataAcquisitionError(
                `Snapshot fetch for ${instrument} failed: ${toError(error).message}`,
                instrument,
                correlationId,
                { cause: error }
            );
        } finally {
            await this.release(connection, subscription, correlationId);
        }

        this.metricsCollector.incrementCounter("snapshot.fetches.completed");
        this.metricsCollector.incrementCounter("snapshot.ticks.collected", collected.length);
        this.metricsCollector.recordGauge("snapshot.lastTickCount", collected.length);
        this.logger.info(
            "Tick snapshot complete",
            { instrument, collected: collected.length },
            correlationId
        );
        return collected;
    }

    private async collect(
        connection: ProviderConnection,
        instrument: string,
        durationSeconds: number,
        collected: Tick[],
        { correlationId, maxTicks }: { correlationId: string; maxTicks: number }
    ): Promise<void> {
        // A dedicated connection carries one subscription, so a tick without
        // a symbol can only belong to the requested instrument.
        const rules = createExtractionRules({ fallbackInstrument: instrument });
        const deadline = this.clock() + durationSeconds;

        while (collected.length < maxTicks) {
            const remainingMs = (deadline - this.clock()) * 1000;
            if (remainingMs <= 0) return;

            const payload = await connection.receive({ timeoutMs: remainingMs });
            if (payload === null) return;

            const message = decodeMessage(payload);
            const rejection = providerError(message);
            if (rejection) {
                throw new ConnectionError(
                    `Provider rejected request: ${describeProviderError(rejection)}`,
                    PROVIDER_SERVICE,
                    correlationId
                );
            }

            const tick = extractTick(message, rules);
            if (!tick) continue;

            try {
                collected.push(this.store.record(tick.instrument, tick.price, tick.timestamp));
            } catch (error) {
                if (!(error instanceof InvalidPriceError)) throw error;
                this.logger.debug(
                    "Dropped snapshot tick with invalid price",
                    { instrument: tick.instrument, rawPrice: tick.rawPrice },
                    correlationId
                );
            }
        }
    }

    private async release(
        connection: ProviderConnection,
        subscription: SubscribeRequest,
        correlationId: string
    ): Promise<void> {
        try {
            await connection.send(forgetRequest(subscription));
        } catch (error) {
            this.logger.warn(
                "Failed to send forget request",
                { instrument: subscription.ticks, error: toError(error) },
                correlationId
            );
        }
        try {
            await connection.close();
        } catch (error) {
            this.logger.warn(
                "Failed to close snapshot connection",
                { instrument: subscription.ticks, error: toError(error) },
                correlationId
            );
        }
    }
}
