// src/infrastructure/logger.ts
import pino from "pino";
import type { DestinationStream, Logger as PinoLogger, LoggerOptions as PinoOptions } from "pino";
import type { ILogger } from "./loggerInterface.js";

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
    level?: LogLevel;
    pretty?: boolean;
    name?: string;
}

const MESSAGE_KEY = "message";

function isPinoLogger(value: LoggerOptions | PinoLogger): value is PinoLogger {
    return "bindings" in value;
}

function createPinoLogger(
    options: LoggerOptions,
    destination?: DestinationStream
): PinoLogger {
    const base: PinoOptions = {
        name: options.name ?? "tick-signal-desk",
        level: options.level ?? "info",
        messageKey: MESSAGE_KEY,
        serializers: { error: pino.stdSerializers.err },
    };

    if (options.pretty && !destination) {
        return pino({
            ...base,
            transport: {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                    ignore: "pid,hostname",
                    messageKey: MESSAGE_KEY,
                },
            },
        });
    }

    const jsonOptions: PinoOptions = {
        ...base,
        timestamp: pino.stdTimeFunctions.isoTime,
        formatters: {
            level: (label) => ({ level: label.toUpperCase() }),
        },
    };
    return destination ? pino(jsonOptions, destination) : pino(jsonOptions);
}

/**
 * Structured logger for the signal desk, backed by pino
 */
export class Logger implements ILogger {
    private readonly pino: PinoLogger;

    constructor(
        options: LoggerOptions | PinoLogger = {},
        destination?: DestinationStream
    ) {
        this.pino = isPinoLogger(options)
            ? options
            : createPinoLogger(options, destination);
    }

    public info(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.info(this.entry(context, correlationId), message);
    }

    public error(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.error(this.entry(context, correlationId), message);
    }

    public warn(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.warn(this.entry(context, correlationId), message);
    }

    public debug(
        message: string,
        context?: Record<string, unknown>,
        correlationId?: string
    ): void {
        this.pino.debug(this.entry(context, correlationId), message);
    }

    public child(component: string): ILogger {
        return new Logger(this.pino.child({ component }));
    }

    private entry(
        context: Record<string, unknown> | undefined,
        correlationId: string | undefined
    ): Record<string, unknown> {
        return correlationId === undefined
            ? { ...context }
            : { ...context, correlationId };
    }
}
