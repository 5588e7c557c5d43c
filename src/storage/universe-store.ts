/**
 * Universe persistence: JSON file storage
 *
 * Stores every named universe in data/universes.json.
 * Atomic writes (tmp + rename) to prevent corruption; writes are
 * serialized so concurrent updates land in call order.
 */

import { mkdir, readFile, rename, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";
import { componentLogger, describeError } from "../utils/logger.js";
import type { Instrument } from "../types/market.js";

const log = componentLogger("universe-store");

// ── Schema ──────────────────────────────────────────────────

export const InstrumentSchema = z.object({
  conId: z.number().int(),
  symbol: z.string().min(1),
  secType: z.string().min(1),
  exchange: z.string(),
  primaryExchange: z.string().optional(),
  currency: z.string(),
  longName: z.string().optional(),
  timeZoneId: z.string().optional(),
  minTick: z.number().optional(),
});

const UniverseFileSchema = z.object({
  version: z.literal(1),
  lastUpdated: z.string(),
  universes: z.record(z.string(), z.array(InstrumentSchema)),
});

type UniverseFile = z.infer<typeof UniverseFileSchema>;

// ── Universe ────────────────────────────────────────────────

/**
 * Named, ordered set of instruments, unique by conId.
 * Insertion order is preserved.
 */
export class Universe {
  private readonly byKey = new Map<number, Instrument>();

  constructor(public readonly name: string, instruments: Iterable<Instrument> = []) {
    for (const instrument of instruments) this.add(instrument);
  }

  has(conId: number): boolean {
    return this.byKey.has(conId);
  }

  find(conId: number): Instrument | undefined {
    return this.byKey.get(conId);
  }

  /** Returns false when an instrument with the same conId is already present */
  add(instrument: Instrument): boolean {
    if (this.byKey.has(instrument.conId)) return false;
    this.byKey.set(instrument.conId, instrument);
    return true;
  }

  remove(conId: number): boolean {
    return this.byKey.delete(conId);
  }

  clear(): void {
    this.byKey.clear();
  }

  get size(): number {
    return this.byKey.size;
  }

  instruments(): Instrument[] {
    return Array.from(this.byKey.values());
  }
}

// ── Store ───────────────────────────────────────────────────

/** Load/replace persistence keyed by universe name */
export interface UniverseStore {
  open(): Promise<void>;
  isOpen(): boolean;
  /** A universe that was never stored comes back empty */
  get(name: string): Promise<Universe>;
  getAll(): Promise<Universe[]>;
  update(universe: Universe): Promise<void>;
}

export class JsonUniverseStore implements UniverseStore {
  private readonly filePath: string;
  private data: UniverseFile | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(dataDir: string, fileName: string = "universes.json") {
    this.filePath = path.resolve(dataDir, fileName);
  }

  async open(): Promise<void> {
    if (this.data) return;
    await mkdir(path.dirname(this.filePath), { recursive: true });
    this.data = await this.readFile();
    log.info(
      `Opened universe store ${this.filePath} ` +
      `(${Object.keys(this.data.universes).length} universes)`
    );
  }

  isOpen(): boolean {
    return this.data !== null;
  }

  async get(name: string): Promise<Universe> {
    const data = this.ensureOpen();
    return new Universe(name, data.universes[name] ?? []);
  }

  async getAll(): Promise<Universe[]> {
    const data = this.ensureOpen();
    return Object.entries(data.universes).map(
      ([name, instruments]) => new Universe(name, instruments)
    );
  }

  update(universe: Universe): Promise<void> {
    const data = this.ensureOpen();
    data.universes[universe.name] = universe.instruments();
    data.lastUpdated = new Date().toISOString();

    const snapshot = JSON.stringify(data, null, 2);
    const write = this.writeChain.then(() => this.writeAtomic(snapshot));
    // a failed write must not wedge the ones queued behind it
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  private ensureOpen(): UniverseFile {
    if (!this.data) {
      throw new Error(`Universe store ${this.filePath} is not open`);
    }
    return this.data;
  }

  private async readFile(): Promise<UniverseFile> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return emptyFile();
      throw err;
    }

    try {
      return UniverseFileSchema.parse(JSON.parse(raw));
    } catch (err) {
      log.warn(`Universe file ${this.filePath} unreadable, starting empty: ${describeError(err)}`);
      return emptyFile();
    }
  }

  private async writeAtomic(contents: string): Promise<void> {
    const tmpFile = `${this.filePath}.tmp`;
    await writeFile(tmpFile, contents, "utf-8");
    await rename(tmpFile, this.filePath);
  }
}

function emptyFile(): UniverseFile {
  return { version: 1, lastUpdated: new Date().toISOString(), universes: {} };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
