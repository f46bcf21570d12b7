// src/market/tickExtraction.ts

import { z } from "zod";
import { FinancialMath } from "../utils/financialMath.js";

const FieldBagSchema = z.record(z.string(), z.unknown());

/**
 * Shape of a provider price update. Subscription acks, authorize replies and
 * anything else fail this schema and are ignored.
 */
export const TickEnvelopeSchema = z
    .object({
        tick: FieldBagSchema,
        echo_req: FieldBagSchema.optional(),
    })
    .passthrough();

export type TickEnvelope = z.infer<typeof TickEnvelopeSchema>;

/**
 * Any reply in which the provider rejects a request (bad symbol, bad token,
 * rate limit) carries a top-level `error` object.
 */
export const ProviderErrorReplySchema = z
    .object({
        error: z
            .object({ code: z.string().optional(), message: z.string().optional() })
            .passthrough(),
    })
    .passthrough();

export interface ProviderErrorDetail {
    code?: string;
    message?: string;
}

/**
 * A pure field lookup. Returns undefined when the message does not carry the
 * field, so the next rule in the list gets a chance.
 */
export type ExtractionRule<T> = (message: TickEnvelope) => T | undefined;

export interface TickExtractionRules {
    instrument: readonly ExtractionRule<string>[];
    price: readonly ExtractionRule<unknown>[];
    timestamp: readonly ExtractionRule<number>[];
}

export interface ParsedTick {
    instrument: string;
    /** NaN when the price field was present but not numeric. */
    price: number;
    rawPrice: unknown;
    /** Server timestamp in seconds, when the message carried one. */
    timestamp: number | undefined;
}

export const explicitSymbol: ExtractionRule<string> = (message) =>
    nonEmptyString(message.tick["symbol"]);

/**
 * Reads the instrument back from the echoed subscribe request. Only sound on a
 * connection carrying a single subscription: with several subscriptions the
 * echo can name a different instrument than the tick.
 */
export const subscriptionEcho: ExtractionRule<string> = (message) =>
    nonEmptyString(message.echo_req?.["ticks"]);

export const fixedInstrument =
    (instrument: string): ExtractionRule<string> =>
    () =>
        instrument;

const priceField =
    (field: string): ExtractionRule<unknown> =>
    (message) => {
        const value = message.tick[field];
        return value === null ? undefined : value;
    };

export const PRICE_RULES: readonly ExtractionRule<unknown>[] = [
    priceField("quote"),
    priceField("price"),
    priceField("bid"),
    priceField("ask"),
];

export const serverEpoch: ExtractionRule<number> = (message) => {
    const epoch = message.tick["epoch"];
    return typeof epoch === "number" && Number.isFinite(epoch) ? epoch : undefined;
};

export interface ExtractionRuleOptions {
    /** Accept `echo_req.ticks` when a tick has no symbol. */
    trustSubscriptionEcho?: boolean;
    /** Last-resort instrument for a dedicated single-instrument subscription. */
    fallbackInstrument?: string;
}

export function createExtractionRules(
    options: ExtractionRuleOptions = {}
): TickExtractionRules {
    const instrument: ExtractionRule<string>[] = [explicitSymbol];
    if (options.trustSubscriptionEcho) instrument.push(subscriptionEcho);
    if (options.fallbackInstrument !== undefined) {
        instrument.push(fixedInstrument(options.fallbackInstrument));
    }
    return { instrument, price: PRICE_RULES, timestamp: [serverEpoch] };
}

/**
 * Evaluates rules in order; the first defined result wins.
 */
export function firstMatch<T>(
    rules: readonly ExtractionRule<T>[],
    message: TickEnvelope
): T | undefined {
    for (const rule of rules) {
        const value = rule(message);
        if (value !== undefined) return value;
    }
    return undefined;
}

/**
 * Decodes a raw payload. Returns undefined for anything that is not JSON.
 */
export function decodeMessage(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}

/**
 * The error of a rejected request, or undefined for any other message.
 */
export function providerError(message: unknown): ProviderErrorDetail | undefined {
    const reply = ProviderErrorReplySchema.safeParse(message);
    return reply.success ? reply.data.error : undefined;
}

export function describeProviderError(detail: ProviderErrorDetail): string {
    const text = detail.message ?? detail.code ?? "unknown reason";
    return detail.code !== undefined && detail.message !== undefined
        ? `${detail.code}: ${text}`
        : text;
}

/**
 * Extracts an instrument tick from a decoded message, or undefined when the
 * message is not a price update or lacks an instrument or a price.
 */
export function extractTick(
    message: unknown,
    rules: TickExtractionRules
): ParsedTick | undefined {
    const envelope = TickEnvelopeSchema.safeParse(message);
    if (!envelope.success) return undefined;

    const instrument = firstMatch(rules.instrument, envelope.data);
    const rawPrice = firstMatch(rules.price, envelope.data);
    if (instrument === undefined || rawPrice === undefined) return undefined;

    return {
        instrument,
        price: FinancialMath.toPrice(rawPrice),
        rawPrice,
        timestamp: firstMatch(rules.timestamp, envelope.data),
    };
}

function nonEmptyString(value: unknown): string | undefined {
    return typeof value === "string" && value.length > 0 ? value : undefined;
}
