import { promises as fs } from "node:fs";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CancelledError, InvalidConfigurationError, NotFoundError, ServiceError } from "../errors.js";
import { OllamaEmbeddingClient, type EmbeddingClient } from "../integrations/ollama/embeddings.js";
import { VectorIndex } from "../retrieval/vectorIndex.js";
import { FakeOllamaTransport, bagOfWords } from "../testing/fakeOllama.js";
import { makeTempDir, removeTempDir, writeFiles } from "../testing/tempDir.js";
import { ingestDirectory } from "./ingest.js";

const MODEL = "nomic-embed-text";

function words(count: number): string {
  return Array.from({ length: count }, (_, i) => `w${i}`).join(" ");
}

describe("ingestDirectory", () => {
  let dir: string;
  let index: VectorIndex;
  let transport: FakeOllamaTransport;
  let embeddings: OllamaEmbeddingClient;

  beforeEach(async () => {
    dir = await makeTempDir();
    index = new VectorIndex();
    transport = new FakeOllamaTransport();
    embeddings = new OllamaEmbeddingClient({ baseUrl: "http://ollama.test", transport });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it("indexes a short file as a single chunk", async () => {
    await writeFiles(dir, { "a.txt": "alpha beta gamma" });

    const count = await ingestDirectory({ folder: dir, embeddingModel: MODEL, index, embeddings });

    expect(count).toBe(1);
    expect(index.size()).toBe(1);
    expect(index.snapshot()).toEqual([
      { text: "alpha beta gamma", source: "a.txt", embedding: bagOfWords("alpha beta gamma") }
    ]);
    expect(transport.callsTo("/api/embeddings")).toEqual([
      {
        method: "POST",
        path: "/api/embeddings",
        payload: { model: MODEL, prompt: "alpha beta gamma" }
      }
    ]);
  });

  it("reports progress per file in traversal order", async () => {
    await writeFiles(dir, {
      "b.md": "beta",
      "a.txt": "alpha",
      "scan.pdf": "%PDF-1.7",
      "nested/c.CSV": "gamma,delta"
    });
    const progress: string[] = [];

    const count = await ingestDirectory({
      folder: dir,
      embeddingModel: MODEL,
      index,
      embeddings,
      onProgress: (message) => progress.push(message)
    });

    expect(progress).toEqual(["Indexing a.txt…", "Indexing b.md…", "Indexing c.CSV…"]);
    expect(count).toBe(3);
    expect(index.snapshot().map((c) => c.source)).toEqual(["a.txt", "b.md", "c.CSV"]);
  });

  it("ignores unsupported files entirely", async () => {
    await writeFiles(dir, { "scan.pdf": "alpha beta" });

    const count = await ingestDirectory({ folder: dir, embeddingModel: MODEL, index, embeddings });

    expect(count).toBe(0);
    expect(index.size()).toBe(0);
    expect(transport.requests).toEqual([]);
  });

  it("appends chunks of a file in chunker order", async () => {
    await writeFiles(dir, { "long.txt": words(5) });

    await ingestDirectory({
      folder: dir,
      embeddingModel: MODEL,
      index,
      embeddings,
      chunkSize: 2,
      chunkOverlap: 0
    });

    expect(index.snapshot().map((c) => c.text)).toEqual(["w0 w1", "w2 w3", "w4"]);
    expect(transport.callsTo("/api/embeddings").map((r) => r.payload?.prompt)).toEqual([
      "w0 w1",
      "w2 w3",
      "w4"
    ]);
  });

  it("skips blank files without calling the embedding service", async () => {
    await writeFiles(dir, { "empty.txt": "", "blank.md": " \n\t\n" });

    await expect(
      ingestDirectory({ folder: dir, embeddingModel: MODEL, index, embeddings })
    ).resolves.toBe(0);
    expect(transport.requests).toEqual([]);
  });

  it("clears the previous contents before rebuilding", async () => {
    index.append({ text: "stale", source: "old.txt", embedding: [1] });
    await writeFiles(dir, { "a.txt": "alpha" });

    await ingestDirectory({ folder: dir, embeddingModel: MODEL, index, embeddings });

    expect(index.snapshot().map((c) => c.text)).toEqual(["alpha"]);
  });

  it("indexes the folder when it holds a broken symlink", async () => {
    index.append({ text: "stale", source: "old.txt", embedding: [1] });
    await writeFiles(dir, { "notes.md": "alpha beta" });
    await fs.symlink(path.join(dir, "missing.md"), path.join(dir, ".#notes.md"));

    const count = await ingestDirectory({ folder: dir, embeddingModel: MODEL, index, embeddings });

    expect(count).toBe(1);
    expect(index.snapshot().map((c) => c.source)).toEqual(["notes.md"]);
  });

  it("fails with NotFoundError and keeps the index when the folder is missing", async () => {
    index.append({ text: "kept", source: "old.txt", embedding: [1] });

    await expect(
      ingestDirectory({
        folder: path.join(dir, "does-not-exist"),
        embeddingModel: MODEL,
        index,
        embeddings
      })
    ).rejects.toThrow(NotFoundError);
    expect(index.size()).toBe(1);
  });

  it("rejects an invalid chunk window before touching the index", async () => {
    index.append({ text: "kept", source: "old.txt", embedding: [1] });
    await writeFiles(dir, { "a.txt": "alpha" });

    await expect(
      ingestDirectory({
        folder: dir,
        embeddingModel: MODEL,
        index,
        embeddings,
        chunkSize: 20,
        chunkOverlap: 20
      })
    ).rejects.toThrow(InvalidConfigurationError);
    expect(index.size()).toBe(1);
  });

  it("aborts the run on the first embedding failure", async () => {
    await writeFiles(dir, { "a.txt": words(6), "b.txt": "beta" });
    const failing: EmbeddingClient = {
      embed: vi.fn(async (text: string) => {
        if (text.startsWith("w2")) {
          throw new ServiceError("model not loaded", { status: 500, body: "model not loaded" });
        }
        return [1, 0];
      })
    };

    await expect(
      ingestDirectory({
        folder: dir,
        embeddingModel: MODEL,
        index,
        embeddings: failing,
        chunkSize: 2,
        chunkOverlap: 0
      })
    ).rejects.toThrow(ServiceError);
    expect(index.snapshot().map((c) => c.text)).toEqual(["w0 w1"]);
    expect(failing.embed).toHaveBeenCalledTimes(2);
  });

  it("embeds chunks concurrently when asked and keeps every chunk", async () => {
    await writeFiles(dir, { "long.txt": words(40) });
    let active = 0;
    let peak = 0;
    const slow: EmbeddingClient = {
      embed: async (text: string) => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 2));
        active -= 1;
        return [text.length, 1];
      }
    };

    const count = await ingestDirectory({
      folder: dir,
      embeddingModel: MODEL,
      index,
      embeddings: slow,
      chunkSize: 4,
      chunkOverlap: 0,
      concurrency: 3
    });

    expect(count).toBe(10);
    expect(peak).toBe(3);
    expect(new Set(index.snapshot().map((c) => c.text)).size).toBe(10);
  });

  it("stops with CancelledError once the signal aborts", async () => {
    await writeFiles(dir, { "a.txt": "alpha", "b.txt": "beta" });
    const controller = new AbortController();

    await expect(
      ingestDirectory({
        folder: dir,
        embeddingModel: MODEL,
        index,
        embeddings,
        signal: controller.signal,
        onProgress: () => controller.abort()
      })
    ).rejects.toThrow(CancelledError);
    expect(transport.requests).toEqual([]);
    expect(index.size()).toBe(0);
  });
});
