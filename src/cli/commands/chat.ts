import readline from "node:readline";

import { toSessionConfig } from "../../config/settings.js";
import { CancelledError } from "../../errors.js";
import { type CommandContext, writeProgress } from "../context.js";

const EXIT_WORDS = new Set(["exit", "quit"]);

export async function runChatCommand(
  args: string[],
  ctx: CommandContext,
  input: NodeJS.ReadableStream = process.stdin
): Promise<void> {
  const folder = args[0] ?? ctx.settings.documentsFolder;
  if (!folder) {
    throw new Error("Usage: docent chat <folder>");
  }

  const session = toSessionConfig(ctx.settings, { documentsFolder: folder });
  const count = await ctx.engine.indexDocuments(session, {
    onProgress: writeProgress,
    signal: ctx.signal
  });
  process.stderr.write(`Indexed ${count} chunks. Ask a question, or "exit" to leave.\n`);

  const rl = readline.createInterface({ input, terminal: false });
  try {
    for await (const line of rl) {
      const question = line.trim();
      if (!question) continue;
      if (EXIT_WORDS.has(question.toLowerCase())) break;

      try {
        const answer = await ctx.engine.answer(question, session, { signal: ctx.signal });
        process.stdout.write(`${answer}\n`);
      } catch (err: unknown) {
        if (err instanceof CancelledError) throw err;
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`${message}\n`);
      }
    }
  } finally {
    rl.close();
  }
}
