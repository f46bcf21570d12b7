import { describe, it, expect, vi } from "vitest";
import { createDependencies } from "../src/core/dependencies.js";
import { parseConfig } from "../src/core/config.js";
import { ListenerState } from "../src/trading/feedListener.js";
import { MockLogger } from "./framework/fakes.js";
import type { ConnectionFactory } from "../src/market/providerConnection.js";

const config = parseConfig(
    {
        provider: { url: "wss://provider.example.test/ws", authorizeTimeoutMs: 1000 },
        store: { maxPointsPerInstrument: 250 },
        feed: { enabled: false, instruments: ["frxEURUSD"], trustSubscriptionEcho: false },
        signal: { defaultTimeframe: "30s", defaultExpiration: "1m" },
        symbols: { EURUSD_OTC: "frxEURUSD" },
        logging: { level: "silent", pretty: false },
    },
    {}
);

describe("core/dependencies", () => {
    it("wires one store and one connection factory through the graph", async () => {
        const logger = new MockLogger();
        const connectionFactory = vi.fn<ConnectionFactory>(() =>
            Promise.reject(new Error("offline"))
        );

        const deps = createDependencies(config, { logger, connectionFactory });

        expect(deps.connectionFactory).toBe(connectionFactory);
        expect(deps.tickStore.maxPointsPerInstrument).toBe(250);
        expect(deps.aliases.resolve("EURUSD_OTC")).toBe("frxEURUSD");
        expect(deps.feedListener.getState()).toBe(ListenerState.IDLE);
        expect(logger.child).toHaveBeenCalledWith("signalService");

        const report = await deps.signalService.requestSignal("frxEURUSD", 30, 60);
        expect(report.rationale).toBe("failed to retrieve data");
        expect(connectionFactory).toHaveBeenCalledTimes(1);
        expect(deps.metricsCollector.getCounter("snapshot.fetches.failed")).toBe(1);
    });
});
