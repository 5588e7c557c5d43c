/**
 * Instrument catalog: the named universes the session knows about,
 * backed by a UniverseStore.
 *
 * The "portfolio" universe is reserved. It mirrors current holdings and
 * is owned by the subscription reconciler; everything else only reads it.
 */

import { componentLogger } from "../utils/logger.js";
import { Universe, type UniverseStore } from "./universe-store.js";
import type { Instrument } from "../types/market.js";

const log = componentLogger("instrument-catalog");

export const PORTFOLIO_UNIVERSE = "portfolio";

export class InstrumentCatalog {
  private readonly universes = new Map<string, Universe>();

  constructor(private readonly store: UniverseStore) {}

  /** Open the store and load every universe into memory */
  async load(): Promise<Universe[]> {
    await this.store.open();
    this.universes.clear();
    for (const universe of await this.store.getAll()) {
      this.universes.set(universe.name, universe);
    }
    log.info(`Loaded ${this.universes.size} universe(s)`);
    return this.list();
  }

  isOpen(): boolean {
    return this.store.isOpen();
  }

  /** Universe by name; a name never seen before yields an empty universe */
  async get(name: string): Promise<Universe> {
    const cached = this.universes.get(name);
    if (cached) return cached;

    const universe = await this.store.get(name);
    // a concurrent caller may have cached it while we waited
    const raced = this.universes.get(name);
    if (raced) return raced;
    this.universes.set(name, universe);
    return universe;
  }

  /** Replace a universe wholesale and persist it */
  async replace(universe: Universe): Promise<void> {
    this.universes.set(universe.name, universe);
    await this.store.update(universe);
  }

  list(): Universe[] {
    return Array.from(this.universes.values());
  }

  // ── Reserved portfolio universe ───────────────────────────

  portfolio(): Promise<Universe> {
    return this.get(PORTFOLIO_UNIVERSE);
  }

  async clearPortfolio(): Promise<void> {
    log.debug("Clearing portfolio universe");
    const universe = await this.portfolio();
    universe.clear();
    await this.store.update(universe);
  }

  /**
   * Add a holding's instrument to the portfolio universe and persist.
   * Returns false (and writes nothing) when it is already there.
   */
  async addToPortfolio(instrument: Instrument): Promise<boolean> {
    const universe = await this.portfolio();
    if (!universe.add(instrument)) return false;
    await this.store.update(universe);
    log.debug(`Portfolio universe += ${instrument.symbol} (conId ${instrument.conId})`);
    return true;
  }
}
