// src/infrastructure/wsProviderConnection.ts

import WebSocket from "ws";
import { ConnectionError } from "../core/errors.js";
import {
    decodeMessage,
    describeProviderError,
    providerError,
} from "../market/tickExtraction.js";
import { PROVIDER_SERVICE as SERVICE } from "../market/providerConnection.js";
import type { ILogger } from "./loggerInterface.js";
import type {
    ConnectionFactory,
    ProviderConnection,
    ReceiveOptions,
} from "../market/providerConnection.js";
import type { ProviderRequest } from "../types/marketEvents.js";

export interface WsProviderConnectionOptions {
    url: string;
    /** Opaque credential, forwarded verbatim in an authorize request. */
    token?: string;
    authorizeTimeoutMs: number;
    /** Oldest payloads are dropped beyond this many unread messages. */
    maxInboxSize?: number;
    closeTimeoutMs?: number;
}

interface PendingReceive {
    resolve: (payload: string | null) => void;
    reject: (error: Error) => void;
}

/**
 * ProviderConnection over a `ws` client socket. Inbound frames are queued
 * until a receive picks them up.
 */
export class WsProviderConnection implements ProviderConnection {
    private readonly inbox: string[] = [];
    private readonly pending: PendingReceive[] = [];
    private readonly ready: Promise<void>;
    private readonly maxInboxSize: number;
    private readonly closeTimeoutMs: number;
    private failure?: ConnectionError;
    private markOpen: () => void = () => {};
    private markFailed: (error: Error) => void = () => {};

    private constructor(
        private readonly socket: WebSocket,
        private readonly logger: ILogger,
        options: WsProviderConnectionOptions,
        private readonly correlationId?: string
    ) {
        this.maxInboxSize = options.maxInboxSize ?? 10_000;
        this.closeTimeoutMs = options.closeTimeoutMs ?? 2_000;
        this.ready = new Promise<void>((resolve, reject) => {
            this.markOpen = resolve;
            this.markFailed = reject;
        });

        socket.on("open", () => this.markOpen());
        socket.on("message", (data: WebSocket.RawData) =>
            this.handleMessage(data.toString())
        );
        socket.on("close", (code: number, reason: Buffer) =>
            this.handleClose(code, reason.toString())
        );
        socket.on("error", (error: Error) => this.handleError(error));
    }

    /**
     * Connects and, when a token is configured, authorizes before returning.
     */
    public static async open(
        options: WsProviderConnectionOptions,
        logger: ILogger,
        correlationId?: string
    ): Promise<WsProviderConnection> {
        const connection = new WsProviderConnection(
            new WebSocket(options.url),
            logger,
            options,
            correlationId
        );
        await connection.ready;
        logger.debug("Provider connection open", { url: options.url }, correlationId);

        if (options.token) {
            try {
                await connection.authorize(options.token, options.authorizeTimeoutMs);
            } catch (error) {
                await connection.close();
                throw error;
            }
        }
        return connection;
    }

    public async send(request: ProviderRequest): Promise<void> {
        if (this.failure) throw this.failure;
        if (this.socket.readyState !== WebSocket.OPEN) {
            throw new ConnectionError(
                "Provider connection is not open",
                SERVICE,
                this.correlationId
            );
        }

        await new Promise<void>((resolve, reject) => {
            this.socket.send(JSON.stringify(request), (error?: Error) => {
                if (error) {
                    reject(
                        new ConnectionError(
                            `Failed to send provider request: ${error.message}`,
                            SERVICE,
                            this.correlationId,
                            { cause: error }
                        )
                    );
                    return;
                }
                resolve();
            });
        });
    }

    public receive(options: ReceiveOptions = {}): Promise<string | null> {
        const queued = this.inbox.shift();
        if (queued !== undefined) return Promise.resolve(queued);
        if (this.failure) return Promise.reject(this.failure);

        const { timeoutMs, signal } = options;
        if (signal?.aborted) return Promise.resolve(null);

        return new Promise<string | null>((resolve, reject) => {
            let timer: NodeJS.Timeout | undefined;
            const finish = (): void => {
                if (timer) clearTimeout(timer);
                signal?.removeEventListener("abort", onAbort);
            };
            const waiter: PendingReceive = {
                resolve: (payload) => {
                    finish();
                    resolve(payload);
                },
                reject: (error) => {
                    finish();
                    reject(error);
                },
            };
            const giveUp = (): void => {
                this.removePending(waiter);
                waiter.resolve(null);
            };
            const onAbort = (): void => giveUp();

            if (timeoutMs !== undefined) {
                timer = setTimeout(giveUp, Math.max(0, timeoutMs));
            }
            signal?.addEventListener("abort", onAbort, { once: true });
            this.pending.push(waiter);
        });
    }

    public async close(): Promise<void> {
        if (this.socket.readyState === WebSocket.CLOSED) return;

        await new Promise<void>((resolve) => {
            const timer = setTimeout(() => {
                this.socket.terminate();
                resolve();
            }, this.closeTimeoutMs);
            this.socket.once("close", () => {
                clearTimeout(timer);
                resolve();
            });
            this.socket.close(1000, "client closing");
        });
    }

    private async authorize(token: string, timeoutMs: number): Promise<void> {
        await this.send({ authorize: token });
        const raw = await this.receive({ timeoutMs });
        if (raw === null) {
            throw new ConnectionError(
                `No authorize reply within ${timeoutMs}ms`,
                SERVICE,
                this.correlationId
            );
        }

        const reply = decodeMessage(raw);
        if (typeof reply !== "object" || reply === null) {
            throw new ConnectionError(
                "Malformed authorize reply",
                SERVICE,
                this.correlationId
            );
        }
        const rejection = providerError(reply);
        if (rejection) {
            throw new ConnectionError(
                `Authorization rejected: ${describeProviderError(rejection)}`,
                SERVICE,
                this.correlationId
            );
        }
        this.logger.debug("Provider authorization accepted", {}, this.correlationId);
    }

    private handleMessage(payload: string): void {
        const waiter = this.pending.shift();
        if (waiter) {
            waiter.resolve(payload);
            return;
        }

        this.inbox.push(payload);
        if (this.inbox.length > this.maxInboxSize) {
            this.inbox.shift();
            this.logger.warn(
                "Provider inbox full, dropped oldest message",
                { maxInboxSize: this.maxInboxSize },
                this.correlationId
            );
        }
    }

    private handleClose(code: number, reason: string): void {
        this.fail(
            new ConnectionError(
                `Provider connection closed (code ${code}${reason ? `: ${reason}` : ""})`,
                SERVICE,
                this.correlationId
            )
        );
    }

    private handleError(error: Error): void {
        this.logger.warn(
            "Provider connection error",
            { error },
            this.correlationId
        );
        this.fail(
            new ConnectionError(error.message, SERVICE, this.correlationId, {
                cause: error,
            })
        );
    }

    private fail(error: ConnectionError): void {
        if (this.failure) return;
        this.failure = error;
        this.markFailed(error);
        for (const waiter of this.pending.splice(0)) {
            waiter.reject(error);
        }
    }

    private removePending(waiter: PendingReceive): void {
        const index = this.pending.indexOf(waiter);
        if (index >= 0) this.pending.splice(index, 1);
    }
}

export function createWsConnectionFactory(
    options: WsProviderConnectionOptions,
    logger: ILogger
): ConnectionFactory {
    return (correlationId?: string) =>
        WsProviderConnection.open(options, logger, correlationId);
}
