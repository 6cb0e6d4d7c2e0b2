import { toSessionConfig } from "../../config/settings.js";
import { type CommandContext, writeProgress } from "../context.js";

export async function runAskCommand(args: string[], ctx: CommandContext): Promise<void> {
  const question = args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: docent ask <question>");
  }
  if (!ctx.settings.documentsFolder) {
    throw new Error("DOCENT_DOCUMENTS_DIR is required for ask");
  }

  const session = toSessionConfig(ctx.settings);
  await ctx.engine.indexDocuments(session, { onProgress: writeProgress, signal: ctx.signal });
  const answer = await ctx.engine.answer(question, session, { signal: ctx.signal });
  process.stdout.write(`${answer}\n`);
}
