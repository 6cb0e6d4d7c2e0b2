#!/usr/bin/env node
import { loadEnv } from "./env.js";

loadEnv();

import { loadSettings } from "../config/settings.js";
import { createLogger } from "../logging/logger.js";
import { RagEngine } from "../rag/engine.js";
import { runAskCommand } from "./commands/ask.js";
import { runChatCommand } from "./commands/chat.js";
import { runIngestCommand } from "./commands/ingest.js";
import { runPingCommand } from "./commands/ping.js";
import type { CommandContext } from "./context.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);
  const settings = loadSettings();
  const logger = createLogger({ level: settings.logLevel });

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);

  const ctx: CommandContext = {
    settings,
    engine: RagEngine.fromSettings(settings, logger),
    signal: controller.signal
  };

  try {
    switch (parsed.command) {
      case "ingest":
        await runIngestCommand(parsed.args, ctx);
        return;
      case "ask":
        await runAskCommand(parsed.args, ctx);
        return;
      case "chat":
        await runChatCommand(parsed.args, ctx);
        return;
      case "ping":
        await runPingCommand(parsed.args, ctx);
        return;
    }
  } finally {
    process.off("SIGINT", onSigint);
  }
}

try {
  await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}
