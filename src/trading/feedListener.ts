// src/trading/feedListener.ts

import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import { InvalidPriceError, toError } from "../core/errors.js";
import {
    createExtractionRules,
    decodeMessage,
    describeProviderError,
    extractTick,
    providerError,
} from "../market/tickExtraction.js";
import { subscribeRequest } from "../types/marketEvents.js";
import type { TickExtractionRules } from "../market/tickExtraction.js";
import type { TickStore } from "../market/tickStore.js";
import type {
    ConnectionFactory,
    ProviderConnection,
} from "../market/providerConnection.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";

export enum ListenerState {
    IDLE = "idle",
    CONNECTING = "connecting",
    STREAMING = "streaming",
    TERMINATED = "terminated",
}

export type TerminationReason = "stopped" | "connect_failed" | "transport_fault";

export interface FeedListenerConfig {
    /** Instruments subscribed on the listener's connection. */
    instruments: readonly string[];
    /** Accept the echoed subscribe request as the instrument of a tick. */
    trustSubscriptionEcho: boolean;
}

/**
 * Long-lived background consumer of the provider tick stream.
 *
 * CONNECTING -> STREAMING -> TERMINATED. Termination happens on stop() or on
 * a transport fault; the listener never reconnects, so cached history simply
 * stops growing and signal requests fall back to snapshot fetches.
 */
export class FeedListener extends EventEmitter {
    private state = ListenerState.IDLE;
    private readonly abort = new AbortController();
    private readonly rules: TickExtractionRules;
    private task?: Promise<TerminationReason>;

    constructor(
        private readonly config: FeedListenerConfig,
        private readonly connect: ConnectionFactory,
        private readonly store: TickStore,
        private readonly logger: ILogger,
        private readonly metricsCollector: IMetricsCollector
    ) {
        super();
        this.rules = createExtractionRules({
            trustSubscriptionEcho: config.trustSubscriptionEcho,
        });
        if (config.trustSubscriptionEcho && config.instruments.length > 1) {
            this.logger.warn(
                "Subscription echo fallback is unreliable with several subscriptions on one connection",
                { instruments: config.instruments }
            );
        }
    }

    /**
     * Runs the listener until it terminates. Never rejects; calling it again
     * returns the same task.
     */
    public start(): Promise<TerminationReason> {
        this.task ??= this.run();
        return this.task;
    }

    /**
     * Requests cooperative cancellation; honoured at the next message wait.
     */
    public stop(): void {
        this.abort.abort();
    }

    public getState(): ListenerState {
        return this.state;
    }

    private async run(): Promise<TerminationReason> {
        const correlationId = randomUUID();
        this.setState(ListenerState.CONNECTING);

        let connection: ProviderConnection;
        try {
            connection = await this.connect(correlationId);
        } catch (error) {
            this.logger.error(
                "Feed listener could not connect",
                { error: toError(error) },
                correlationId
            );
            this.metricsCollector.incrementCounter("feed.connections.failed");
            return this.terminate("connect_failed");
        }

        let reason: TerminationReason = "stopped";
        try {
            for (const instrument of this.config.instruments) {
                await connection.send(subscribeRequest(instrument));
            }
            this.logger.info(
                "Feed listener streaming",
                { instruments: this.config.instruments },
                correlationId
            );
            this.setState(ListenerState.STREAMING);

            while (!this.abort.signal.aborted) {
                const payload = await connection.receive({
                    signal: this.abort.signal,
                });
                if (payload !== null) this.handleMessage(payload, correlationId);
            }
        } catch (error) {
            reason = "transport_fault";
            this.logger.error(
                "Feed listener terminated by transport fault",
                { error: toError(error) },
                correlationId
            );
            this.metricsCollector.incrementCounter("feed.transport.faults");
        } finally {
            await this.release(connection, correlationId);
        }
        return this.terminate(reason);
    }

    private handleMessage(payload: string, correlationId: string): void {
        this.metricsCollector.incrementCounter("feed.messages.received");

        const message = decodeMessage(payload);
        const rejection = providerError(message);
        if (rejection) {
            // e.g. an unknown symbol in the watch list; other subscriptions keep streaming
            this.metricsCollector.incrementCounter("feed.messages.rejected");
            this.logger.warn(
                "Provider rejected a feed request",
                { reason: describeProviderError(rejection) },
                correlationId
            );
            return;
        }

        const tick = extractTick(message, this.rules);
        if (!tick) {
            this.metricsCollector.incrementCounter("feed.messages.ignored");
            this.logger.debug("Ignored non-tick message", { length: payload.length }, correlationId);
            return;
        }

        try {
            this.store.record(tick.instrument, tick.price, tick.timestamp);
            this.metricsCollector.incrementCounter("feed.ticks.recorded");
        } catch (error) {
            if (!(error instanceof InvalidPriceError)) throw error;
            this.metricsCollector.incrementCounter("feed.ticks.invalid");
            this.logger.debug(
                "Dropped tick with invalid price",
                { instrument: tick.instrument, rawPrice: tick.rawPrice },
                correlationId
            );
        }
    }

    private async release(
        connection: ProviderConnection,
        correlationId: string
    ): Promise<void> {
        try {
            await connection.close();
        } catch (error) {
            this.logger.warn(
                "Failed to close feed connection",
                { error: toError(error) },
                correlationId
            );
        }
    }

    private terminate(reason: TerminationReason): TerminationReason {
        this.setState(ListenerState.TERMINATED);
        this.emit("terminated", reason);
        return reason;
    }

    private setState(newState: ListenerState): void {
        const oldState = this.state;
        this.state = newState;
        this.metricsCollector.recordGauge(
            "feed.streaming",
            newState === ListenerState.STREAMING ? 1 : 0
        );
        this.logger.debug("Listener state changed", { from: oldState, to: newState });
        this.emit("stateChange", { from: oldState, to: newState });
    }
}
