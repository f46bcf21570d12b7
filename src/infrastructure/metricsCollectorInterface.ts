// src/infrastructure/metricsCollectorInterface.ts

import type { MetricsSnapshot } from "./metricsCollector.js";

/**
 * Interface for metrics collection
 * Provides abstraction for dependency injection and testing
 */
export interface IMetricsCollector {
    incrementCounter(name: string, increment?: number): void;
    getCounter(name: string): number;

    recordGauge(name: string, value: number): void;
    getGaugeValue(name: string): number | null;

    getMetrics(): MetricsSnapshot;
    reset(): void;
}
