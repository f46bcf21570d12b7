// src/market/providerConnection.ts

import type { ProviderRequest } from "../types/marketEvents.js";

/** Service name carried by provider-side ConnectionErrors. */
export const PROVIDER_SERVICE = "market_data_provider";

export interface ReceiveOptions {
    /** Resolve with null when nothing arrives within this many ms. */
    timeoutMs?: number;
    /** Resolve with null as soon as the signal aborts. */
    signal?: AbortSignal;
}

/**
 * An open duplex channel to the market-data provider.
 *
 * `receive` yields raw text payloads in arrival order. It resolves null on
 * timeout or abort and rejects with a ConnectionError once the channel has
 * failed or closed.
 */
export interface ProviderConnection {
    send(request: ProviderRequest): Promise<void>;
    receive(options?: ReceiveOptions): Promise<string | null>;
    close(): Promise<void>;
}

/**
 * Opens a fresh, authorized connection. Each caller owns the connection it
 * receives and closes it when done.
 */
export type ConnectionFactory = (correlationId?: string) => Promise<ProviderConnection>;
