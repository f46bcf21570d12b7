// src/console/commandConsole.ts

import { createInterface } from "readline";
import { InvalidDurationError, toError } from "../core/errors.js";
import { parseDuration } from "../utils/duration.js";
import { HELP_TEXT, parseCommand } from "./commandParser.js";
import type { CommandDefaults, ConsoleCommand } from "./commandParser.js";
import type { InstrumentAliases } from "./instrumentAliases.js";
import type { SignalService } from "../trading/signalService.js";
import type { TickStore } from "../market/tickStore.js";
import type { ILogger } from "../infrastructure/loggerInterface.js";
import type { IMetricsCollector } from "../infrastructure/metricsCollectorInterface.js";
import type { SignalReport } from "../types/signalTypes.js";

export interface CommandConsoleDeps {
    signalService: SignalService;
    aliases: InstrumentAliases;
    tickStore: TickStore;
    metricsCollector: IMetricsCollector;
    logger: ILogger;
}

export interface ReportLabels {
    pair: string;
    timeframe: string;
    expiration: string;
}

/**
 * Renders a report the way the console prints it.
 */
export function formatReport(report: SignalReport, labels: ReportLabels): string[] {
    return [
        "----- SIGNAL -----",
        `${report.signal} for ${labels.pair} (provider: ${report.instrument})`,
        `Price: ${report.lastPrice ?? "n/a"}`,
        `Timeframe: ${labels.timeframe} Expiration: ${labels.expiration}`,
        `Reason: ${report.rationale}`,
        "------------------",
    ];
}

/**
 * Line-oriented command surface over the signal service. It only recommends;
 * nothing here places orders.
 */
export class CommandConsole {
    constructor(
        private readonly deps: CommandConsoleDeps,
        private readonly defaults: CommandDefaults,
        private readonly output: NodeJS.WritableStream = process.stdout
    ) {}

    /**
     * Reads commands until `quit` or end of input.
     */
    public async run(input: NodeJS.ReadableStream = process.stdin): Promise<void> {
        const rl = createInterface({ input, output: this.output, prompt: ">> " });
        // Ctrl+C on a terminal ends the loop like end of input.
        rl.on("SIGINT", () => rl.close());
        this.print("Signal desk. Type 'help' for commands.");
        rl.prompt();
        try {
            for await (const line of rl) {
                if (!(await this.handleLine(line))) break;
                rl.prompt();
            }
        } finally {
            rl.close();
        }
    }

    /**
     * Executes one line. Returns false when the console should exit.
     */
    public async handleLine(line: string): Promise<boolean> {
        const command = parseCommand(line, this.defaults);
        return this.execute(command);
    }

    private async execute(command: ConsoleCommand): Promise<boolean> {
        switch (command.kind) {
            case "empty":
                return true;
            case "quit":
                this.print("Exiting...");
                return false;
            case "help":
                this.print(HELP_TEXT);
                return true;
            case "list":
                this.print("Known pairs:");
                for (const [alias, symbol] of this.deps.aliases.entries()) {
                    this.print(`  ${alias} -> ${symbol}`);
                }
                return true;
            case "add":
                this.deps.aliases.add(command.pair, command.symbol);
                this.print(`Added: ${command.pair} -> ${command.symbol}`);
                return true;
            case "stats":
                this.printStats();
                return true;
            case "usage":
                this.print(command.usage);
                return true;
            case "unknown":
                this.print("unknown command. Type help");
                return true;
            case "signal":
                await this.signal(command.pair, command.timeframe, command.expiration);
                return true;
        }
    }

    private async signal(pair: string, timeframe: string, expiration: string): Promise<void> {
        try {
            const report = await this.deps.signalService.requestSignal(
                this.deps.aliases.resolve(pair),
                parseDuration(timeframe),
                parseDuration(expiration)
            );
            for (const line of formatReport(report, { pair, timeframe, expiration })) {
                this.print(line);
            }
        } catch (error) {
            if (error instanceof InvalidDurationError) {
                this.print(`error: ${error.message}`);
                return;
            }
            this.deps.logger.error("Signal command failed", {
                pair,
                error: toError(error),
            });
            this.print(`error: signal for ${pair} failed`);
        }
    }

    private printStats(): void {
        const instruments = this.deps.tickStore.instruments();
        this.print("Cached ticks:");
        if (instruments.length === 0) this.print("  (none)");
        for (const instrument of instruments) {
            this.print(`  ${instrument}: ${this.deps.tickStore.count(instrument)}`);
        }
        const { counters, gauges } = this.deps.metricsCollector.getMetrics();
        this.print("Counters:");
        for (const [name, value] of Object.entries(counters)) {
            this.print(`  ${name}: ${value}`);
        }
        this.print("Gauges:");
        for (const [name, value] of Object.entries(gauges)) {
            this.print(`  ${name}: ${value}`);
        }
    }

    private print(text: string): void {
        this.output.write(`${text}\n`);
    }
}
