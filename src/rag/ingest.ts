import path from "node:path";

import { Mutex } from "../concurrency/mutex.js";
import { assertConcurrency, runWithConcurrency } from "../concurrency/pool.js";
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../config/settings.js";
import { throwIfCancelled } from "../errors.js";
import type { EmbeddingClient } from "../integrations/ollama/embeddings.js";
import { assertDirectory, listSourceFiles, loadSourceFile } from "../loaders/sourceDirectory.js";
import { type Logger, silentLogger } from "../logging/logger.js";
import type { VectorIndex } from "../retrieval/vectorIndex.js";
import { WordWindowTextSplitter } from "./chunker.js";

export type ProgressSink = (message: string) => void;

/**
 * Rebuild `index` from the supported files under `folder` and return the
 * number of indexed chunks.
 *
 * The folder and chunking parameters are checked before the index is
 * cleared. A failed embedding aborts the run and leaves whatever was
 * appended until then.
 */
export async function ingestDirectory(params: {
  folder: string;
  embeddingModel: string;
  index: VectorIndex;
  embeddings: EmbeddingClient;
  onProgress?: ProgressSink;
  signal?: AbortSignal;
  chunkSize?: number;
  chunkOverlap?: number;
  concurrency?: number;
  logger?: Logger;
}): Promise<number> {
  const logger = params.logger ?? silentLogger;
  const splitter = new WordWindowTextSplitter({
    chunkSize: params.chunkSize ?? DEFAULT_CHUNK_SIZE,
    chunkOverlap: params.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP
  });
  const concurrency = params.concurrency ?? 1;
  assertConcurrency(concurrency);

  await assertDirectory(params.folder);
  throwIfCancelled(params.signal);

  params.index.clear();
  const files = await listSourceFiles(params.folder, { logger });
  logger.info("Indexing folder", { folder: params.folder, files: files.length });

  const appendLock = new Mutex();

  for (const filePath of files) {
    throwIfCancelled(params.signal);
    const source = path.basename(filePath);
    params.onProgress?.(`Indexing ${source}…`);

    const docs = await loadSourceFile(filePath);
    const splits = await Promise.all(docs.map((d) => splitter.splitText(d.pageContent)));
    const texts = splits.flat().filter((t) => t.trim().length > 0);

    await runWithConcurrency(texts, concurrency, async (text) => {
      throwIfCancelled(params.signal);
      const embedding = await params.embeddings.embed(text, params.embeddingModel, params.signal);
      await appendLock.runExclusive(() => {
        params.index.append({ embedding, text, source });
      });
    });

    logger.debug("Indexed file", { file: source, chunks: texts.length });
  }

  const count = params.index.size();
  logger.info("Indexing finished", { files: files.length, chunks: count });
  return count;
}
