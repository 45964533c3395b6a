import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Persistence, type SnapshotParams } from "../src/persistence";
import { DocumentSessionStore, type DocumentSession } from "../src/session";
import { VectorIndex } from "../src/vector-index";
import { makeChunk } from "./helpers";

const params: SnapshotParams = { chunkSize: 100, chunkOverlap: 10, modelName: "fake-model" };

describe("Persistence", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "doc-rag-persist-"));
    file = path.join(dir, "nested", "session.json");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function sampleSession(): DocumentSession {
    const index = new VectorIndex("doc");
    index.insert(makeChunk(0, "first"), Float32Array.from([0.25, -1.5]));
    index.insert(makeChunk(1, "second"), Float32Array.from([3, 0]));
    return new DocumentSessionStore().replace(
      { id: "doc", filename: "doc.pdf", text: "first second", pageCount: 2 },
      index,
    );
  }

  async function saveSample(persistence: Persistence): Promise<void> {
    await persistence.save(sampleSession(), params);
  }

  it("round-trips the active session", async () => {
    const persistence = new Persistence(file);
    await saveSample(persistence);
    const loaded = await persistence.load("fake-model");
    expect(loaded?.params).toEqual(params);
    expect(loaded?.document).toEqual({ id: "doc", filename: "doc.pdf", text: "first second", pageCount: 2 });
    expect(loaded?.index.documentId).toBe("doc");
    expect(Array.from(loaded?.index.entries() ?? [], ([c, v]) => [c.text, c.start, Array.from(v)])).toEqual([
      ["first", 0, [0.25, -1.5]],
      ["second", 10, [3, 0]],
    ]);
  });

  it("ignores snapshots embedded with another model", async () => {
    const persistence = new Persistence(file);
    await saveSample(persistence);
    expect(await persistence.load("other-model")).toBeNull();
  });

  it("applies saves and removals in call order", async () => {
    const persistence = new Persistence(file);
    await Promise.all([persistence.save(sampleSession(), params), persistence.remove()]);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it("skips a queued save that is no longer wanted", async () => {
    const persistence = new Persistence(file);
    await persistence.save(sampleSession(), params, () => false);
    await expect(fs.access(file)).rejects.toThrow();
  });

  it("returns null for a missing file", async () => {
    expect(await new Persistence(path.join(dir, "absent.json")).load("fake-model")).toBeNull();
  });

  it("returns null for malformed content", async () => {
    const bad = path.join(dir, "bad.json");
    await fs.writeFile(bad, "{not json");
    expect(await new Persistence(bad).load("fake-model")).toBeNull();
    await fs.writeFile(bad, JSON.stringify({ version: 2, chunks: [] }));
    expect(await new Persistence(bad).load("fake-model")).toBeNull();
  });

  it("returns null when a vector cannot be decoded", async () => {
    const persistence = new Persistence(file);
    await saveSample(persistence);
    const snapshot = JSON.parse(await fs.readFile(file, "utf8"));
    snapshot.chunks[1].emb = Buffer.from([1, 2, 3]).toString("base64");
    await fs.writeFile(file, JSON.stringify(snapshot));
    expect(await persistence.load("fake-model")).toBeNull();
  });

  it("removes the snapshot, tolerating a missing file", async () => {
    const persistence = new Persistence(file);
    await saveSample(persistence);
    await persistence.remove();
    await expect(fs.access(file)).rejects.toThrow();
    await expect(persistence.remove()).resolves.toBeUndefined();
  });
});
