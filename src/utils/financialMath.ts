// src/utils/financialMath.ts

/**
 * Price helpers. All arithmetic stays in double precision; nothing is rounded
 * before it is compared.
 */
export class FinancialMath {
    /**
     * Arithmetic mean, 0 for an empty sequence.
     */
    static calculateMean(values: readonly number[]): number {
        if (values.length === 0) return 0;
        let sum = 0;
        for (const value of values) sum += value;
        return sum / values.length;
    }

    /**
     * Mean of the last `count` values, or of all values when fewer exist.
     */
    static calculateTailMean(values: readonly number[], count: number): number {
        return this.calculateMean(
            values.length > count ? values.slice(values.length - count) : values
        );
    }

    static isValidPrice(price: number): boolean {
        return Number.isFinite(price);
    }

    /**
     * Converts a provider price field to a number. Numeric strings are
     * accepted; anything else becomes NaN.
     */
    static toPrice(raw: unknown): number {
        if (typeof raw === "number") return raw;
        if (typeof raw === "string" && raw.trim() !== "") return Number(raw);
        return Number.NaN;
    }

    static formatFixed(value: number, decimals: number): string {
        return value.toFixed(decimals);
    }
}
