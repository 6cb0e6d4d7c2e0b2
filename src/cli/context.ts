import type { Settings } from "../config/settings.js";
import type { RagEngine } from "../rag/engine.js";

export type CommandContext = {
  settings: Settings;
  engine: RagEngine;
  signal: AbortSignal;
};

export function writeProgress(message: string): void {
  process.stderr.write(`${message}\n`);
}
