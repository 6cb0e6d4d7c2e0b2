import { toSessionConfig } from "../../config/settings.js";
import { type CommandContext, writeProgress } from "../context.js";

export async function runIngestCommand(args: string[], ctx: CommandContext): Promise<void> {
  const folder = args[0] ?? ctx.settings.documentsFolder;
  if (!folder) {
    throw new Error("Usage: docent ingest <folder>");
  }

  const count = await ctx.engine.indexDocuments(
    toSessionConfig(ctx.settings, { documentsFolder: folder }),
    { onProgress: writeProgress, signal: ctx.signal }
  );
  process.stdout.write(`${count}\n`);
}
