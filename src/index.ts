#!/usr/bin/env node
// src/index.ts
import { createDependencies } from "./core/dependencies.js";
import { loadConfig } from "./core/config.js";
import { ConfigError, toError } from "./core/errors.js";
import { CommandConsole } from "./console/commandConsole.js";
import type { AppConfig } from "./core/config.js";
import type { TerminationReason } from "./trading/feedListener.js";

function readConfig(): AppConfig {
    try {
        return loadConfig();
    } catch (error: unknown) {
        // Logger is configured from this file, so report straight to stderr.
        console.error(`Configuration error: ${toError(error).message}`);
        if (error instanceof ConfigError) {
            for (const issue of error.issues) console.error(`  ${issue}`);
        }
        process.exit(1);
    }
}

/**
 * Main entry point for the signal desk
 */
export async function main(): Promise<void> {
    const config = readConfig();
    const dependencies = createDependencies(config);
    const { logger, feedListener } = dependencies;

    let feedTask: Promise<TerminationReason> | undefined;
    if (config.feed.enabled && config.feed.instruments.length > 0) {
        feedListener.on("terminated", (reason: TerminationReason) => {
            logger.info("Feed listener terminated", { reason });
        });
        feedTask = feedListener.start();
    }

    const shutdown = async (): Promise<void> => {
        feedListener.stop();
        if (feedTask) await feedTask;
    };

    process.once("SIGINT", () => {
        void shutdown().then(() => process.exit(0));
    });

    const commandConsole = new CommandConsole(
        {
            signalService: dependencies.signalService,
            aliases: dependencies.aliases,
            tickStore: dependencies.tickStore,
            metricsCollector: dependencies.metricsCollector,
            logger: logger.child("console"),
        },
        {
            timeframe: config.signal.defaultTimeframe,
            expiration: config.signal.defaultExpiration,
        }
    );

    await commandConsole.run();
    await shutdown();
}

await main();
