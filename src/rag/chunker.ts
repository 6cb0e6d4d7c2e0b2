import { TextSplitter, type TextSplitterParams } from "@langchain/textsplitters";

import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from "../config/settings.js";
import { InvalidConfigurationError } from "../errors.js";

export type WordWindow = {
  chunkSize: number;
  chunkOverlap: number;
};

export function validateWordWindow(window: WordWindow): WordWindow {
  const { chunkSize, chunkOverlap } = window;
  if (!Number.isInteger(chunkSize) || !Number.isInteger(chunkOverlap)) {
    throw new InvalidConfigurationError(
      `Chunk size and overlap must be integers (size=${chunkSize}, overlap=${chunkOverlap})`
    );
  }
  if (chunkOverlap < 0 || chunkSize <= chunkOverlap) {
    throw new InvalidConfigurationError(
      `Chunk size must be greater than overlap and overlap must not be negative (size=${chunkSize}, overlap=${chunkOverlap})`
    );
  }
  return window;
}

/**
 * Split text into windows of `chunkSize` whitespace-separated words, each
 * starting `chunkSize - chunkOverlap` words after the previous one. The last
 * window may be shorter.
 */
export function chunkWords(
  text: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
  chunkOverlap: number = DEFAULT_CHUNK_OVERLAP
): string[] {
  validateWordWindow({ chunkSize, chunkOverlap });

  const words = text.split(/\s+/).filter((w) => w.length > 0);
  const stride = chunkSize - chunkOverlap;
  const chunks: string[] = [];

  for (let start = 0; start < words.length; start += stride) {
    chunks.push(words.slice(start, start + chunkSize).join(" "));
  }
  return chunks;
}

/** Word-window splitting for LangChain document pipelines. */
export class WordWindowTextSplitter extends TextSplitter {
  static lc_name(): string {
    return "WordWindowTextSplitter";
  }

  constructor(fields?: Partial<Pick<TextSplitterParams, "chunkSize" | "chunkOverlap">>) {
    super(
      validateWordWindow({
        chunkSize: fields?.chunkSize ?? DEFAULT_CHUNK_SIZE,
        chunkOverlap: fields?.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP
      })
    );
  }

  async splitText(text: string): Promise<string[]> {
    return chunkWords(text, this.chunkSize, this.chunkOverlap);
  }
}
