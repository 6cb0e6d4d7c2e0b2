import { promises as fs, type Stats } from "node:fs";
import path from "node:path";

import { TextLoader } from "@langchain/classic/document_loaders/fs/text";
import type { Document } from "@langchain/core/documents";

import { NotFoundError } from "../errors.js";
import { type Logger, silentLogger } from "../logging/logger.js";

type AnyMetadata = Record<string, unknown>;

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([".txt", ".md", ".csv"]);

export function isSupportedFile(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

function errorCode(err: unknown): unknown {
  return err && typeof err === "object" && "code" in err ? err.code : undefined;
}

export async function assertDirectory(dir: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(dir);
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new NotFoundError(`Folder not found: ${dir}`, { cause: err });
    }
    throw err;
  }
  if (!stats.isDirectory()) {
    throw new NotFoundError(`Not a folder: ${dir}`);
  }
}

async function isLinkedFile(linkPath: string, logger: Logger): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code === "ENOENT" || code === "ELOOP") {
      logger.warn("Skipping broken symlink", { file: linkPath });
      return false;
    }
    throw err;
  }
}

/**
 * Supported files under `sourceDir`, depth first. Entries of each directory
 * are visited in name order. Symlinked directories are not followed and
 * broken links are skipped.
 */
export async function listSourceFiles(
  sourceDir: string,
  params: { logger?: Logger } = {}
): Promise<string[]> {
  const logger = params.logger ?? silentLogger;
  const entries = await fs.readdir(sourceDir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(sourceDir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listSourceFiles(fullPath, params)));
      continue;
    }
    if (!isSupportedFile(entry.name)) continue;
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(fullPath, logger)))) {
      files.push(fullPath);
    }
  }
  return files;
}

export async function loadSourceFile(filePath: string): Promise<Document<AnyMetadata>[]> {
  return new TextLoader(filePath).load();
}
