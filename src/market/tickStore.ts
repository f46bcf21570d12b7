// src/market/tickStore.ts

import { CircularBuffer } from "../utils/circularBuffer.js";
import { FinancialMath } from "../utils/financialMath.js";
import { InvalidPriceError } from "../core/errors.js";
import { systemClock } from "../types/marketEvents.js";
import type { Clock, Tick } from "../types/marketEvents.js";

export interface TickStoreOptions {
    /** Maximum ticks retained per instrument; older ones are evicted FIFO. */
    maxPointsPerInstrument: number;
    clock?: Clock;
}

/**
 * Bounded per-instrument tick history.
 *
 * Histories are ordered by arrival, not by timestamp, so out-of-order ticks
 * keep their arrival position. Every operation is synchronous and therefore
 * atomic with respect to the feed listener and a snapshot fetch writing to
 * the same instrument.
 */
export class TickStore {
    private readonly histories = new Map<string, CircularBuffer<Tick>>();
    private readonly capacity: number;
    private readonly clock: Clock;

    constructor(options: TickStoreOptions) {
        this.capacity = options.maxPointsPerInstrument;
        this.clock = options.clock ?? systemClock;
    }

    /**
     * Appends a tick. Throws InvalidPriceError for a non-finite price and
     * leaves the history untouched.
     */
    public record(instrument: string, price: number, timestamp?: number): Tick {
        if (!FinancialMath.isValidPrice(price)) {
            throw new InvalidPriceError(
                `Rejected non-finite price for ${instrument}`,
                instrument,
                price
            );
        }

        const tick: Tick = Object.freeze({
            timestamp:
                timestamp !== undefined && Number.isFinite(timestamp)
                    ? timestamp
                    : this.clock(),
            price,
        });
        this.history(instrument).add(tick);
        return tick;
    }

    /**
     * Prices whose timestamp is within the last `windowSeconds`, in insertion
     * order. An unknown instrument gets an empty history and yields an empty
     * list. A short result means insufficient data, not a fault.
     */
    public pricesSince(instrument: string, windowSeconds: number): number[] {
        const cutoff = this.clock() - windowSeconds;
        return this.history(instrument)
            .filter((tick) => tick.timestamp >= cutoff)
            .map((tick) => tick.price);
    }

    public count(instrument: string): number {
        return this.histories.get(instrument)?.length ?? 0;
    }

    public instruments(): string[] {
        return [...this.histories.keys()].sort();
    }

    public get maxPointsPerInstrument(): number {
        return this.capacity;
    }

    private history(instrument: string): CircularBuffer<Tick> {
        let history = this.histories.get(instrument);
        if (!history) {
            history = new CircularBuffer<Tick>(this.capacity);
            this.histories.set(instrument, history);
        }
        return history;
    }
}
