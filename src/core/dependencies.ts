// src/core/dependencies.ts

import { Logger } from "../infrastructure/logger.js";
import { MetricsCollector } from "../infrastructure/metricsCollector.js";
import { createWsConnectionFactory } from "../infrastructure/wsProviderConnection.js";
import { TickStore } from "../market/tickStore.js";
import { FeedListener } from "../trading/feedListener.js";
import { SnapshotFetcher } from "../trading/snapshotFetcher.js";
import { SignalService } from "../trading/signalService.js";
import { InstrumentAliases } from "../console/instrumentAliases.js";
import type { AppConfig } from "./config.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { ConnectionFactory } from "../market/providerConnection.js";

/**
 * Application dependencies interface
 */
export interface Dependencies {
    config: AppConfig;

    // Infrastructure
    logger: ILogger;
    metricsCollector: IMetricsCollector;
    connectionFactory: ConnectionFactory;

    // Market data
    tickStore: TickStore;
    feedListener: FeedListener;
    snapshotFetcher: SnapshotFetcher;

    // Signals
    signalService: SignalService;
    aliases: InstrumentAliases;
}

export interface DependencyOverrides {
    logger?: ILogger;
    connectionFactory?: ConnectionFactory;
}

/**
 * Builds the object graph. The tick store is created once here and handed to
 * every writer and reader; nothing holds it globally.
 */
export function createDependencies(
    config: AppConfig,
    overrides: DependencyOverrides = {}
): Dependencies {
    const logger =
        overrides.logger ??
        new Logger({ level: config.logging.level, pretty: config.logging.pretty });
    const metricsCollector = new MetricsCollector();
    const connectionFactory =
        overrides.connectionFactory ??
        createWsConnectionFactory(
            {
                url: config.provider.url,
                authorizeTimeoutMs: config.provider.authorizeTimeoutMs,
                ...(config.provider.token !== undefined
                    ? { token: config.provider.token }
                    : {}),
            },
            logger.child("provider")
        );

    const tickStore = new TickStore({
        maxPointsPerInstrument: config.store.maxPointsPerInstrument,
    });
    const feedListener = new FeedListener(
        {
            instruments: config.feed.instruments,
            trustSubscriptionEcho: config.feed.trustSubscriptionEcho,
        },
        connectionFactory,
        tickStore,
        logger.child("feedListener"),
        metricsCollector
    );
    const snapshotFetcher = new SnapshotFetcher(
        connectionFactory,
        tickStore,
        logger.child("snapshotFetcher"),
        metricsCollector
    );
    const signalService = new SignalService(
        tickStore,
        snapshotFetcher,
        logger.child("signalService"),
        metricsCollector
    );

    return {
        config,
        logger,
        metricsCollector,
        connectionFactory,
        tickStore,
        feedListener,
        snapshotFetcher,
        signalService,
        aliases: new InstrumentAliases(config.symbols),
    };
}
