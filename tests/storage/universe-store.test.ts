/**
 * Universe Store Tests
 *
 * Runs against a scratch directory under the OS temp dir.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { JsonUniverseStore, Universe } from "../../src/storage/universe-store.js";
import { instrument } from "../fixtures.js";

describe("Universe", () => {
  it("should stay unique by conId and keep insertion order", () => {
    const universe = new Universe("tech", [instrument(2, "GLOBEX"), instrument(1, "ACME")]);

    expect(universe.add(instrument(2, "GLOBEX"))).toBe(false);
    expect(universe.add(instrument(3, "INITECH"))).toBe(true);
    expect(universe.instruments().map((i) => i.symbol)).toEqual(["GLOBEX", "ACME", "INITECH"]);
  });

  it("should find and remove by conId", () => {
    const universe = new Universe("tech", [instrument(1, "ACME")]);

    expect(universe.find(1)?.symbol).toBe("ACME");
    expect(universe.remove(1)).toBe(true);
    expect(universe.has(1)).toBe(false);
    expect(universe.size).toBe(0);
  });
});

describe("JsonUniverseStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "universe-store-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should start empty when no file exists", async () => {
    const store = new JsonUniverseStore(dir);
    await store.open();

    expect(store.isOpen()).toBe(true);
    expect(await store.getAll()).toEqual([]);
    expect((await store.get("portfolio")).size).toBe(0);
  });

  it("should persist universes across instances", async () => {
    const store = new JsonUniverseStore(dir);
    await store.open();
    await store.update(new Universe("portfolio", [instrument(1, "ACME"), instrument(2, "GLOBEX")]));

    const reopened = new JsonUniverseStore(dir);
    await reopened.open();
    const universe = await reopened.get("portfolio");

    expect(universe.instruments().map((i) => i.conId)).toEqual([1, 2]);
    expect(universe.find(1)?.timeZoneId).toBe("America/New_York");
  });

  it("should land concurrent updates in call order", async () => {
    const store = new JsonUniverseStore(dir);
    await store.open();

    await Promise.all([
      store.update(new Universe("a", [instrument(1, "ACME")])),
      store.update(new Universe("b", [instrument(2, "GLOBEX")])),
    ]);

    const raw = JSON.parse(await readFile(path.join(dir, "universes.json"), "utf-8"));
    expect(Object.keys(raw.universes).sort()).toEqual(["a", "b"]);
  });

  it("should start empty over a corrupt file", async () => {
    await writeFile(path.join(dir, "universes.json"), "{ not json", "utf-8");
    const store = new JsonUniverseStore(dir);
    await store.open();

    expect(await store.getAll()).toEqual([]);
  });

  it("should refuse reads before open", async () => {
    const store = new JsonUniverseStore(dir);

    expect(store.isOpen()).toBe(false);
    await expect(store.getAll()).rejects.toThrow("is not open");
  });
});
