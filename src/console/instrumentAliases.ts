// src/console/instrumentAliases.ts

/**
 * User-facing instrument names mapped to provider symbols. Names without an
 * alias are passed through unchanged.
 */
export class InstrumentAliases {
    private readonly aliases = new Map<string, string>();

    constructor(initial: Record<string, string> = {}) {
        for (const [alias, symbol] of Object.entries(initial)) {
            this.add(alias, symbol);
        }
    }

    public resolve(name: string): string {
        return this.aliases.get(name) ?? name;
    }

    public add(alias: string, symbol: string): void {
        this.aliases.set(alias, symbol);
    }

    public entries(): [alias: string, symbol: string][] {
        return [...this.aliases.entries()];
    }
}
