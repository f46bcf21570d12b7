// src/types/marketEvents.ts

/**
 * A single timestamped price observation. Timestamps are seconds since epoch.
 */
export interface Tick {
    readonly timestamp: number;
    readonly price: number;
}

/**
 * Wall clock returning seconds since epoch (fractional).
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now() / 1000;

export interface SubscribeRequest {
    ticks: string;
    subscribe: 1;
}

export interface ForgetRequest {
    forget: SubscribeRequest;
}

export interface AuthorizeRequest {
    authorize: string;
}

export type ProviderRequest = SubscribeRequest | ForgetRequest | AuthorizeRequest;

export function subscribeRequest(instrument: string): SubscribeRequest {
    return { ticks: instrument, subscribe: 1 };
}

/**
 * The unsubscribe request echoes the original subscribe payload.
 */
export function forgetRequest(subscription: SubscribeRequest): ForgetRequest {
    return { forget: subscription };
}
