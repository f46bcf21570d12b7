import { describe, it, expect, beforeEach } from "vitest";
import { Readable, Writable } from "stream";
import { CommandConsole, formatReport } from "../src/console/commandConsole.js";
import { HELP_TEXT } from "../src/console/commandParser.js";
import { InstrumentAliases } from "../src/console/instrumentAliases.js";
import { SignalService } from "../src/trading/signalService.js";
import { SnapshotFetcher } from "../src/trading/snapshotFetcher.js";
import { TickStore } from "../src/market/tickStore.js";
import { MetricsCollector } from "../src/infrastructure/metricsCollector.js";
import { MockLogger } from "./framework/fakes.js";
import type { SignalReport } from "../src/types/signalTypes.js";

describe("console/CommandConsole", () => {
    let chunks: string[];
    let store: TickStore;
    let metrics: MetricsCollector;
    let desk: CommandConsole;

    const output = (): string => chunks.join("");

    beforeEach(() => {
        chunks = [];
        const sink = new Writable({
            write(chunk: Buffer, _encoding, callback) {
                chunks.push(chunk.toString());
                callback();
            },
        });
        const clock = (): number => 1000;
        const logger = new MockLogger();
        store = new TickStore({ maxPointsPerInstrument: 50, clock });
        metrics = new MetricsCollector();
        const fetcher = new SnapshotFetcher(
            () => Promise.reject(new Error("refused")),
            store,
            logger,
            metrics,
            clock
        );
        desk = new CommandConsole(
            {
                signalService: new SignalService(store, fetcher, logger, metrics, { clock }),
                aliases: new InstrumentAliases({ EURUSD_OTC: "frxEURUSD" }),
                tickStore: store,
                metricsCollector: metrics,
                logger,
            },
            { timeframe: "1m", expiration: "2m" },
            sink
        );
    });

    it("prints a report for a signal request", async () => {
        expect(await desk.handleLine("signal EURUSD_OTC")).toBe(true);
        expect(output()).toBe(
            [
                "----- SIGNAL -----",
                "HOLD for EURUSD_OTC (provider: frxEURUSD)",
                "Price: n/a",
                "Timeframe: 1m Expiration: 2m",
                "Reason: failed to retrieve data",
                "------------------",
                "",
            ].join("\n")
        );
    });

    it("prints duration errors", async () => {
        await desk.handleLine("signal EURUSD_OTC timeframe=1d");
        expect(output()).toBe('error: Invalid duration "1d", use e.g. 30s, 1m, 1h\n');
    });

    it("adds and lists aliases", async () => {
        await desk.handleLine("add GOLD frxXAUUSD");
        await desk.handleLine("list");
        expect(output()).toBe(
            [
                "Added: GOLD -> frxXAUUSD",
                "Known pairs:",
                "  EURUSD_OTC -> frxEURUSD",
                "  GOLD -> frxXAUUSD",
                "",
            ].join("\n")
        );
    });

    it("prints cached tick counts, counters and gauges", async () => {
        store.record("frxEURUSD", 1.1, 1000);
        metrics.incrementCounter("feed.ticks.recorded", 3);
        metrics.recordGauge("feed.streaming", 1);
        await desk.handleLine("stats");
        expect(output()).toBe(
            [
                "Cached ticks:",
                "  frxEURUSD: 1",
                "Counters:",
                "  feed.ticks.recorded: 3",
                "Gauges:",
                "  feed.streaming: 1",
                "",
            ].join("\n")
        );
    });

    it("handles help, unknown input and quit", async () => {
        expect(await desk.handleLine("help")).toBe(true);
        expect(await desk.handleLine("dance")).toBe(true);
        expect(await desk.handleLine("quit")).toBe(false);
        expect(output()).toBe(`${HELP_TEXT}\nunknown command. Type help\nExiting...\n`);
    });

    it("runs until quit", async () => {
        await desk.run(Readable.from(["list\n", "quit\n", "list\n"]));
        expect(output().endsWith("Exiting...\n")).toBe(true);
        expect(output().match(/Known pairs:/g)).toHaveLength(1);
    });
});

describe("console/formatReport", () => {
    it("shows the last price and the rationale", () => {
        const report: SignalReport = {
            signal: "BUY",
            rationale: "fastMA 9.00000 > slowMA 6.50000, slope 1.000000",
            computedAt: 1000,
            instrument: "frxEURUSD",
            timeframeSeconds: 60,
            expirationSeconds: 120,
            lastPrice: 1.10512,
            requestedAt: 1000,
            source: "cache",
            correlationId: "cid",
        };
        expect(formatReport(report, { pair: "EURUSD_OTC", timeframe: "1m", expiration: "2m" })).toEqual([
            "----- SIGNAL -----",
            "BUY for EURUSD_OTC (provider: frxEURUSD)",
            "Price: 1.10512",
            "Timeframe: 1m Expiration: 2m",
            "Reason: fastMA 9.00000 > slowMA 6.50000, slope 1.000000",
            "------------------",
        ]);
    });
});
