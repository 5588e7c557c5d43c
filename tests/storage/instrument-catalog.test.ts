/**
 * Instrument Catalog Tests
 */

import { describe, it, expect } from "vitest";
import { InstrumentCatalog, PORTFOLIO_UNIVERSE } from "../../src/storage/instrument-catalog.js";
import { Universe } from "../../src/storage/universe-store.js";
import { MemoryUniverseStore, instrument } from "../fixtures.js";

describe("InstrumentCatalog", () => {
  it("should load every stored universe", async () => {
    const store = new MemoryUniverseStore({
      tech: [instrument(1, "ACME")],
      [PORTFOLIO_UNIVERSE]: [instrument(2, "GLOBEX")],
    });
    const catalog = new InstrumentCatalog(store);

    const universes = await catalog.load();

    expect(universes.map((u) => u.name).sort()).toEqual(["portfolio", "tech"]);
    expect(catalog.isOpen()).toBe(true);
  });

  it("should persist an addition to the portfolio universe once", async () => {
    const store = new MemoryUniverseStore();
    const catalog = new InstrumentCatalog(store);
    await catalog.load();

    expect(await catalog.addToPortfolio(instrument(1, "ACME"))).toBe(true);
    expect(await catalog.addToPortfolio(instrument(1, "ACME"))).toBe(false);

    expect(store.writes).toEqual(["portfolio"]);
    expect(store.stored("portfolio").map((i) => i.conId)).toEqual([1]);
  });

  it("should clear and persist the portfolio universe", async () => {
    const store = new MemoryUniverseStore({ [PORTFOLIO_UNIVERSE]: [instrument(1, "ACME")] });
    const catalog = new InstrumentCatalog(store);
    await catalog.load();

    await catalog.clearPortfolio();

    expect((await catalog.portfolio()).size).toBe(0);
    expect(store.stored("portfolio")).toEqual([]);
  });

  it("should hand concurrent callers the same universe", async () => {
    const catalog = new InstrumentCatalog(new MemoryUniverseStore());
    await catalog.load();

    const [first, second] = await Promise.all([catalog.get("watch"), catalog.get("watch")]);

    expect(first).toBe(second);
  });

  it("should replace a universe wholesale", async () => {
    const store = new MemoryUniverseStore({ tech: [instrument(1, "ACME")] });
    const catalog = new InstrumentCatalog(store);
    await catalog.load();

    await catalog.replace(new Universe("tech", [instrument(3, "INITECH")]));

    expect((await catalog.get("tech")).instruments().map((i) => i.symbol)).toEqual(["INITECH"]);
    expect(store.stored("tech").map((i) => i.conId)).toEqual([3]);
  });
});
