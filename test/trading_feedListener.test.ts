import { describe, it, expect, beforeEach, vi } from "vitest";
import { FeedListener, ListenerState } from "../src/trading/feedListener.js";
import { TickStore } from "../src/market/tickStore.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { ConnectionError } from "../src/core/errors.js";
import { FakeProviderConnection, MockLogger, tickMessage } from "./framework/fakes.js";
import type { ProviderConnection } from "../src/market/providerConnection.js";

describe("trading/FeedListener", () => {
    let store: TickStore;
    let metrics: MetricsCollector;
    let logger: MockLogger;

    const listenerFor = (
        connection: ProviderConnection,
        instruments: string[] = ["frxEURUSD"],
        trustSubscriptionEcho = false
    ): FeedListener =>
        new FeedListener(
            { instruments, trustSubscriptionEcho },
            () => Promise.resolve(connection),
            store,
            logger,
            metrics
        );

    beforeEach(() => {
        store = new TickStore({ maxPointsPerInstrument: 100, clock: () => 1000 });
        metrics = new MetricsCollector();
        logger = new MockLogger();
    });

    it("records ticks until stopped", async () => {
        const connection = new FakeProviderConnection(
            [
                tickMessage({ symbol: "frxEURUSD", quote: 1.1, epoch: 1000 }),
                JSON.stringify({ msg_type: "ticks", echo_req: { ticks: "frxEURUSD" } }),
                tickMessage({ symbol: "frxEURUSD", quote: "x", epoch: 1000 }),
            ],
            { whenDrained: "wait" }
        );
        const listener = listenerFor(connection);
        const transitions: string[] = [];
        listener.on("stateChange", ({ from, to }: { from: string; to: string }) =>
            transitions.push(`${from}->${to}`)
        );
        const terminated = vi.fn();
        listener.on("terminated", terminated);

        const task = listener.start();
        await connection.drained;
        expect(listener.getState()).toBe(ListenerState.STREAMING);
        expect(metrics.getGaugeValue("feed.streaming")).toBe(1);
        listener.stop();

        expect(await task).toBe("stopped");
        expect(store.pricesSince("frxEURUSD", 10)).toEqual([1.1]);
        expect(connection.sent).toEqual([{ ticks: "frxEURUSD", subscribe: 1 }]);
        expect(connection.closeCount).toBe(1);
        expect(metrics.getCounter("feed.messages.received")).toBe(3);
        expect(metrics.getCounter("feed.messages.ignored")).toBe(1);
        expect(metrics.getCounter("feed.ticks.recorded")).toBe(1);
        expect(metrics.getCounter("feed.ticks.invalid")).toBe(1);
        expect(transitions).toEqual([
            "idle->connecting",
            "connecting->streaming",
            "streaming->terminated",
        ]);
        expect(terminated).toHaveBeenCalledWith("stopped");
        expect(listener.getState()).toBe(ListenerState.TERMINATED);
        expect(metrics.getGaugeValue("feed.streaming")).toBe(0);
    });

    it("warns about a rejected subscription and keeps streaming", async () => {
        const connection = new FakeProviderConnection(
            [
                JSON.stringify({
                    msg_type: "tick",
                    echo_req: { ticks: "BOGUS", subscribe: 1 },
                    error: { code: "InvalidSymbol", message: "Symbol BOGUS is invalid." },
                }),
                tickMessage({ symbol: "frxEURUSD", quote: 1.3, epoch: 1000 }),
            ],
            { whenDrained: "wait" }
        );
        const listener = listenerFor(connection, ["BOGUS", "frxEURUSD"]);

        const task = listener.start();
        await connection.drained;
        expect(listener.getState()).toBe(ListenerState.STREAMING);
        listener.stop();

        expect(await task).toBe("stopped");
        expect(store.pricesSince("frxEURUSD", 10)).toEqual([1.3]);
        expect(store.count("BOGUS")).toBe(0);
        expect(metrics.getCounter("feed.messages.rejected")).toBe(1);
        expect(metrics.getCounter("feed.messages.ignored")).toBe(0);
        expect(logger.warn).toHaveBeenCalledWith(
            "Provider rejected a feed request",
            { reason: "InvalidSymbol: Symbol BOGUS is invalid." },
            expect.any(String)
        );
    });

    it("subscribes every configured instrument", async () => {
        const connection = new FakeProviderConnection([], { whenDrained: "wait" });
        const listener = listenerFor(connection, ["frxEURUSD", "frxGBPUSD"]);

        const task = listener.start();
        await connection.drained;
        listener.stop();
        await task;

        expect(connection.sent).toEqual([
            { ticks: "frxEURUSD", subscribe: 1 },
            { ticks: "frxGBPUSD", subscribe: 1 },
        ]);
    });

    it("terminates on a transport fault and keeps what it recorded", async () => {
        const connection = new FakeProviderConnection([
            tickMessage({ symbol: "frxEURUSD", quote: 1.2, epoch: 1000 }),
            new ConnectionError("socket closed", "market_data_provider"),
        ]);
        const listener = listenerFor(connection);

        expect(await listener.start()).toBe("transport_fault");
        expect(store.count("frxEURUSD")).toBe(1);
        expect(connection.closeCount).toBe(1);
        expect(metrics.getCounter("feed.transport.faults")).toBe(1);
        expect(listener.getState()).toBe(ListenerState.TERMINATED);
    });

    it("terminates when the connection cannot be opened", async () => {
        const listener = new FeedListener(
            { instruments: ["frxEURUSD"], trustSubscriptionEcho: false },
            () => Promise.reject(new Error("refused")),
            store,
            logger,
            metrics
        );

        expect(await listener.start()).toBe("connect_failed");
        expect(metrics.getCounter("feed.connections.failed")).toBe(1);
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it("returns the same task when started twice", async () => {
        const connection = new FakeProviderConnection([], { whenDrained: "wait" });
        const listener = listenerFor(connection);

        const first = listener.start();
        expect(listener.start()).toBe(first);
        await connection.drained;
        listener.stop();
        expect(await first).toBe("stopped");
    });

    it("attributes symbol-less ticks through a trusted echo", async () => {
        const connection = new FakeProviderConnection(
            [tickMessage({ quote: 900.5, epoch: 1000 }, "R_100")],
            { whenDrained: "wait" }
        );
        const listener = listenerFor(connection, ["R_100"], true);

        const task = listener.start();
        await connection.drained;
        listener.stop();
        await task;

        expect(store.pricesSince("R_100", 10)).toEqual([900.5]);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    it("drops symbol-less ticks when the echo is not trusted", async () => {
        const connection = new FakeProviderConnection(
            [tickMessage({ quote: 900.5, epoch: 1000 }, "R_100")],
            { whenDrained: "wait" }
        );
        const listener = listenerFor(connection, ["R_100"]);

        const task = listener.start();
        await connection.drained;
        listener.stop();
        await task;

        expect(store.count("R_100")).toBe(0);
        expect(metrics.getCounter("feed.messages.ignored")).toBe(1);
    });

    it("warns when the echo is trusted across several subscriptions", () => {
        listenerFor(new FakeProviderConnection(), ["frxEURUSD", "frxGBPUSD"], true);
        expect(logger.warn).toHaveBeenCalledTimes(1);
    });
});
