// src/infrastructure/metricsCollector.ts

import type { IMetricsCollector } from "./metricsCollectorInterface.js";

interface CounterMetric {
    value: number;
    lastIncrement: number;
}

interface GaugeMetric {
    value: number;
    timestamp: number;
}

export interface MetricsSnapshot {
    counters: Record<string, number>;
    gauges: Record<string, number>;
    uptimeMs: number;
}

/**
 * In-process counters and gauges for the feed, snapshot and signal paths
 */
export class MetricsCollector implements IMetricsCollector {
    private readonly counters = new Map<string, CounterMetric>();
    private readonly gauges = new Map<string, GaugeMetric>();
    private startedAt = Date.now();

    public incrementCounter(name: string, increment: number = 1): void {
        const counter = this.counters.get(name);
        if (counter) {
            counter.value += increment;
            counter.lastIncrement = Date.now();
            return;
        }
        this.counters.set(name, { value: increment, lastIncrement: Date.now() });
    }

    public getCounter(name: string): number {
        return this.counters.get(name)?.value ?? 0;
    }

    /**
     * Record a gauge value (for current state metrics)
     */
    public recordGauge(name: string, value: number): void {
        this.gauges.set(name, { value, timestamp: Date.now() });
    }

    public getGaugeValue(name: string): number | null {
        return this.gauges.get(name)?.value ?? null;
    }

    public getMetrics(): MetricsSnapshot {
        const counters: Record<string, number> = {};
        for (const [name, counter] of [...this.counters].sort(byName)) {
            counters[name] = counter.value;
        }
        const gauges: Record<string, number> = {};
        for (const [name, gauge] of [...this.gauges].sort(byName)) {
            gauges[name] = gauge.value;
        }
        return { counters, gauges, uptimeMs: Date.now() - this.startedAt };
    }

    public reset(): void {
        this.counters.clear();
        this.gauges.clear();
        this.startedAt = Date.now();
    }
}

function byName<T>(a: [string, T], b: [string, T]): number {
    return a[0].localeCompare(b[0]);
}
