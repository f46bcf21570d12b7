// src/console/commandParser.ts

export interface CommandDefaults {
    timeframe: string;
    expiration: string;
}

export type ConsoleCommand =
    | { kind: "signal"; pair: string; timeframe: string; expiration: string }
    | { kind: "add"; pair: string; symbol: string }
    | { kind: "list" }
    | { kind: "stats" }
    | { kind: "help" }
    | { kind: "quit" }
    | { kind: "empty" }
    | { kind: "usage"; usage: string }
    | { kind: "unknown"; input: string };

export const SIGNAL_USAGE = "Usage: signal <PAIR> [timeframe=1m] [expiration=2m]";
export const ADD_USAGE = "Usage: add <PAIR> <PROVIDER_SYMBOL>";

export const HELP_TEXT = [
    "Commands:",
    "  signal <PAIR> [timeframe=1m] [expiration=2m]",
    "  list  -> show instrument aliases",
    "  add <PAIR> <PROVIDER_SYMBOL>",
    "  stats -> cached ticks and counters",
    "  quit",
].join("\n");

/**
 * Splits one console line into a command. Durations are left as text; they
 * are validated when the signal is requested.
 */
export function parseCommand(line: string, defaults: CommandDefaults): ConsoleCommand {
    const parts = line.trim().split(/\s+/).filter((part) => part.length > 0);
    const [head, ...args] = parts;
    if (head === undefined) return { kind: "empty" };

    switch (head.toLowerCase()) {
        case "quit":
        case "exit":
            return { kind: "quit" };
        case "help":
            return { kind: "help" };
        case "list":
            return { kind: "list" };
        case "stats":
            return { kind: "stats" };
        case "add": {
            const [pair, symbol] = args;
            if (pair === undefined || symbol === undefined) {
                return { kind: "usage", usage: ADD_USAGE };
            }
            return { kind: "add", pair, symbol };
        }
        case "signal": {
            const [pair, ...options] = args;
            if (pair === undefined) return { kind: "usage", usage: SIGNAL_USAGE };

            let { timeframe, expiration } = defaults;
            for (const option of options) {
                if (option.startsWith("timeframe=")) {
                    timeframe = option.slice("timeframe=".length);
                } else if (option.startsWith("expiration=")) {
                    expiration = option.slice("expiration=".length);
                }
            }
            return { kind: "signal", pair, timeframe, expiration };
        }
        default:
            return { kind: "unknown", input: head };
    }
}
