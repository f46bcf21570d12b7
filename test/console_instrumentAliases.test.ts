import { describe, it, expect } from "vitest";
import { InstrumentAliases } from "../src/console/instrumentAliases.js";

describe("console/InstrumentAliases", () => {
    it("resolves known aliases and passes other names through", () => {
        const aliases = new InstrumentAliases({ EURUSD_OTC: "frxEURUSD" });
        expect(aliases.resolve("EURUSD_OTC")).toBe("frxEURUSD");
        expect(aliases.resolve("R_100")).toBe("R_100");
    });

    it("adds and overrides aliases", () => {
        const aliases = new InstrumentAliases({ EURUSD_OTC: "frxEURUSD" });
        aliases.add("GOLD", "frxXAUUSD");
        aliases.add("EURUSD_OTC", "OTC_EURUSD");
        expect(aliases.entries()).toEqual([
            ["EURUSD_OTC", "OTC_EURUSD"],
            ["GOLD", "frxXAUUSD"],
        ]);
    });
});
